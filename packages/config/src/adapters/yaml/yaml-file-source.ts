import fs from "node:fs/promises"
import path from "node:path"
import { createNullLogger, type Logger } from "@modeldeck/logger"
import { parse, stringify } from "yaml"
import { z } from "zod"
import { ConfigError } from "../../core/errors"
import { isFileMissing } from "../../core/fs-errors"
import { resolveEnvReference } from "../../core/interpolate"
import {
  type ConfigurationDocument,
  configurationDocumentSchema,
  emptyDocument,
} from "../../model/document"
import type { WritableProfileSource } from "../../ports/source"

export type YamlFileSourceOptions = {
  /**
   * Path to the YAML file. Relative paths resolve against `cwd`.
   *
   * @example "~/.modeldeck/config.yaml" (expanded by the caller)
   */
  file: string

  /**
   * Base directory for resolving a relative `file`.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Variables used to resolve `${NAME}` api keys on load.
   *
   * @default process.env
   */
  env?: Record<string, string | undefined>

  /**
   * Permission bits applied to the file after every write.
   *
   * @default 0o600
   */
  mode?: number
}

export type YamlFileSourceDeps = {
  logger?: Logger
}

export class YamlFileSource implements WritableProfileSource {
  readonly name: string
  readonly supportsSave = true as const
  readonly path: string

  private readonly env: Record<string, string | undefined>
  private readonly mode: number
  private readonly logger: Logger

  constructor(opts: YamlFileSourceOptions, deps: YamlFileSourceDeps = {}) {
    this.path = path.resolve(opts.cwd ?? process.cwd(), opts.file)
    this.name = `yaml:${this.path}`
    this.env = opts.env ?? process.env
    this.mode = opts.mode ?? 0o600
    this.logger = (deps.logger ?? createNullLogger()).child({ source: this.name })
  }

  async load(): Promise<ConfigurationDocument> {
    let content: string

    try {
      content = await fs.readFile(this.path, "utf-8")
    } catch (err) {
      if (isFileMissing(err)) {
        this.logger.debug("Configuration file missing, starting empty", { path: this.path })
        return emptyDocument()
      }
      throw ConfigError.io("load", this.path, err)
    }

    const doc = this.parse(content)

    for (const profile of Object.values(doc.profiles)) {
      profile.api_key = resolveEnvReference(profile.api_key, this.env)
    }

    this.logger.debug("Configuration loaded", {
      path: this.path,
      profiles: Object.keys(doc.profiles).length,
    })

    return doc
  }

  async save(doc: ConfigurationDocument): Promise<void> {
    const content = stringify(doc)

    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true })
      await fs.writeFile(this.path, content, { encoding: "utf-8", mode: this.mode })
      await fs.chmod(this.path, this.mode)
    } catch (err) {
      throw ConfigError.io("save", this.path, err)
    }

    this.logger.debug("Configuration saved", { path: this.path })
  }

  private parse(content: string): ConfigurationDocument {
    let raw: unknown

    try {
      raw = parse(content)
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      throw ConfigError.parse(this.path, detail, err)
    }

    const result = configurationDocumentSchema.safeParse(raw ?? {})

    if (!result.success) {
      throw ConfigError.parse(this.path, z.prettifyError(result.error), result.error)
    }

    return result.data
  }
}
