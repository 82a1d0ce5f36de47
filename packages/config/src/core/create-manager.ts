import type { Logger } from "@modeldeck/logger"
import { EnvProfileSource } from "../adapters/env/env-profile-source"
import { YamlFileSource } from "../adapters/yaml/yaml-file-source"
import type { IProfileManager } from "../ports/profile-manager"
import type { ProfileSource } from "../ports/source"
import { ConfigError } from "./errors"
import { defaultConfigPath } from "./paths"
import { ProfileManager } from "./profile-manager"
import { ReadOnlyProfileManager } from "./read-only-profile-manager"

export const profileSourceKinds = ["yaml", "env"] as const

export type ProfileSourceKind = (typeof profileSourceKinds)[number]

export type CreateProfileSourceOptions = {
  /** @default ~/.modeldeck/config.yaml */
  configPath?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** .env file seeding the environment source */
  dotenvFile?: string

  logger?: Logger
}

export function createProfileSource(
  kind: string,
  options: CreateProfileSourceOptions = {},
): ProfileSource {
  const env = options.env ?? process.env

  switch (kind) {
    case "yaml":
      return new YamlFileSource(
        { file: options.configPath ?? defaultConfigPath(), env },
        { ...(options.logger && { logger: options.logger }) },
      )
    case "env":
      return new EnvProfileSource({
        env,
        ...(options.dotenvFile !== undefined && { dotenvFile: options.dotenvFile }),
      })
    default:
      throw ConfigError.unknownSource(kind)
  }
}

/**
 * Wraps a source in the manager matching its capability: read-only sources
 * get a ReadOnlyProfileManager.
 */
export function createProfileManager(
  source: ProfileSource,
  deps: { logger?: Logger } = {},
): IProfileManager {
  const managerDeps = { source, ...(deps.logger && { logger: deps.logger }) }

  return source.supportsSave
    ? new ProfileManager(managerDeps)
    : new ReadOnlyProfileManager(managerDeps)
}
