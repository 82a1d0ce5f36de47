import fs from "node:fs/promises"
import { parse } from "dotenv"
import { ConfigError } from "../../core/errors"
import { isFileMissing } from "../../core/fs-errors"
import type { ConfigurationDocument } from "../../model/document"
import type { ReadableProfileSource } from "../../ports/source"

export const ENV_PROFILE_NAME = "env-profile"

export const DEFAULT_ENV_PREFIX = "MODELDECK_"

export type EnvProfileSourceOptions = {
  /**
   * Prefix of the PROVIDER, MODEL and API_KEY variables.
   *
   * @default "MODELDECK_"
   */
  prefix?: string

  /**
   * @default process.env
   */
  env?: Record<string, string | undefined>

  /**
   * Optional .env file read before every load. A missing file is ignored;
   * variables already set in `env` take precedence over the file.
   */
  dotenvFile?: string
}

/**
 * Synthesizes a single read-only profile named `env-profile` from
 * environment variables. Unset variables become empty strings.
 */
export class EnvProfileSource implements ReadableProfileSource {
  readonly name = "env"
  readonly supportsSave = false as const

  private readonly prefix: string
  private readonly env: Record<string, string | undefined>
  private readonly dotenvFile?: string | undefined

  constructor(options: EnvProfileSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
    this.dotenvFile = options.dotenvFile
  }

  async load(): Promise<ConfigurationDocument> {
    const fromFile = await this.readDotenv()
    const read = (key: string): string => {
      const name = `${this.prefix}${key}`
      return this.env[name] ?? fromFile[name] ?? ""
    }

    return {
      default_profile: ENV_PROFILE_NAME,
      profiles: {
        [ENV_PROFILE_NAME]: {
          provider: read("PROVIDER"),
          model: read("MODEL"),
          api_key: read("API_KEY"),
          params: {},
        },
      },
    }
  }

  private async readDotenv(): Promise<Record<string, string>> {
    if (!this.dotenvFile) return {}

    try {
      const content = await fs.readFile(this.dotenvFile, "utf-8")
      return parse(content)
    } catch (err) {
      if (isFileMissing(err)) return {}
      throw ConfigError.io("load", this.dotenvFile, err)
    }
  }
}
