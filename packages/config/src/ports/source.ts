import type { ConfigurationDocument } from "../model/document"

type ProfileSourceBase = {
  /**
   * Human-readable name for logs and diagnostics.
   * Example: "env", "yaml:/home/me/.modeldeck/config.yaml"
   */
  readonly name: string

  /**
   * Load the whole document. Each call returns a fresh object; callers may
   * mutate it freely.
   */
  load(): Promise<ConfigurationDocument>
}

/**
 * A source that can only be read, such as the process environment.
 */
export interface ReadableProfileSource extends ProfileSourceBase {
  readonly supportsSave: false
}

/**
 * A source that can also persist the document.
 */
export interface WritableProfileSource extends ProfileSourceBase {
  readonly supportsSave: true

  save(doc: ConfigurationDocument): Promise<void>
}

/**
 * Where profiles come from. Narrow on `supportsSave` to reach `save`.
 */
export type ProfileSource = ReadableProfileSource | WritableProfileSource
