import { createNullLogger, type Logger } from "@modeldeck/logger"
import { type ConfigurationDocument, setEntry } from "../model/document"
import type {
  IProfileManager,
  NewProfileInput,
  ProfileSummary,
  ProfileUpdate,
  ResolvedProfile,
} from "../ports/profile-manager"
import type { ProfileSource } from "../ports/source"
import { ConfigError } from "./errors"

export type ProfileManagerDeps = {
  source: ProfileSource
  logger?: Logger
}

export class ProfileManager implements IProfileManager {
  readonly source: ProfileSource
  protected readonly logger: Logger

  private cache?: ConfigurationDocument

  constructor(deps: ProfileManagerDeps) {
    this.source = deps.source
    this.logger = (deps.logger ?? createNullLogger()).child({ source: deps.source.name })
  }

  async getConfig(): Promise<ConfigurationDocument> {
    if (!this.cache) {
      this.cache = await this.source.load()
      this.logger.debug("Configuration cached", {
        profiles: Object.keys(this.cache.profiles).length,
      })
    }
    return this.cache
  }

  async getProfile(name?: string): Promise<ResolvedProfile> {
    const config = await this.getConfig()
    const profileName = name ?? config.default_profile

    if (!profileName) {
      throw ConfigError.notFound(name ?? "(default)")
    }

    const profile = hasProfile(config, profileName) ? config.profiles[profileName] : undefined

    if (!profile) {
      throw ConfigError.notFound(profileName)
    }

    return { name: profileName, ...profile }
  }

  async listProfiles(): Promise<ProfileSummary[]> {
    const config = await this.getConfig()

    return Object.entries(config.profiles).map(([name, profile]) => ({
      name,
      provider: profile.provider,
      model: profile.model,
      isDefault: name === config.default_profile,
    }))
  }

  async addProfile(name: string, input: NewProfileInput): Promise<void> {
    const config = await this.getConfig()

    if (hasProfile(config, name)) {
      throw ConfigError.alreadyExists(name)
    }

    setEntry(config.profiles, name, {
      provider: input.provider,
      model: input.model,
      api_key: input.apiKey,
      params: { ...input.params },
    })

    if (!config.default_profile) {
      config.default_profile = name
    }

    await this.save()
    this.logger.debug("Profile added", { profile: name, operation: "add" })
  }

  async editProfile(name: string, update: ProfileUpdate): Promise<void> {
    const config = await this.getConfig()
    const profile = hasProfile(config, name) ? config.profiles[name] : undefined

    if (!profile) {
      throw ConfigError.notFound(name)
    }

    if (update.provider !== undefined) profile.provider = update.provider
    if (update.model !== undefined) profile.model = update.model
    if (update.apiKey !== undefined) profile.api_key = update.apiKey
    if (update.params !== undefined) profile.params = { ...update.params }

    await this.save()
    this.logger.debug("Profile edited", {
      profile: name,
      operation: "edit",
      fields: Object.entries(update)
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key),
    })
  }

  async deleteProfile(name: string): Promise<void> {
    const config = await this.getConfig()

    if (!hasProfile(config, name)) {
      throw ConfigError.notFound(name)
    }

    delete config.profiles[name]

    if (config.default_profile === name) {
      config.default_profile = Object.keys(config.profiles)[0] ?? null
    }

    await this.save()
    this.logger.debug("Profile deleted", {
      profile: name,
      operation: "delete",
      defaultProfile: config.default_profile,
    })
  }

  async setDefault(name: string): Promise<void> {
    const config = await this.getConfig()

    if (!hasProfile(config, name)) {
      throw ConfigError.notFound(name)
    }

    config.default_profile = name

    await this.save()
    this.logger.debug("Default profile set", { profile: name, operation: "set_default" })
  }

  async save(): Promise<void> {
    const source = this.source

    if (!source.supportsSave) {
      throw ConfigError.unsupported("save", source.name)
    }

    await source.save(await this.getConfig())
  }
}

function hasProfile(config: ConfigurationDocument, name: string): boolean {
  return Object.hasOwn(config.profiles, name)
}
