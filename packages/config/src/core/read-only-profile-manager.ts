import type { NewProfileInput, ProfileUpdate } from "../ports/profile-manager"
import { ConfigError, type ProfileOperation } from "./errors"
import { ProfileManager } from "./profile-manager"

/**
 * Reads like ProfileManager; every mutation rejects with
 * `unsupported_operation` before the cached document or the source is touched.
 */
export class ReadOnlyProfileManager extends ProfileManager {
  override async addProfile(_name: string, _input: NewProfileInput): Promise<void> {
    throw this.rejected("add")
  }

  override async editProfile(_name: string, _update: ProfileUpdate): Promise<void> {
    throw this.rejected("edit")
  }

  override async deleteProfile(_name: string): Promise<void> {
    throw this.rejected("delete")
  }

  override async setDefault(_name: string): Promise<void> {
    throw this.rejected("set_default")
  }

  override async save(): Promise<void> {
    throw this.rejected("save")
  }

  private rejected(operation: ProfileOperation): ConfigError {
    this.logger.debug("Mutation rejected on read-only source", { operation })
    return ConfigError.unsupported(operation, this.source.name)
  }
}
