import {
  type ConfigurationDocument,
  cloneDocument,
  emptyDocument,
} from "../../model/document"
import type { WritableProfileSource } from "../../ports/source"

/**
 * Keeps the document in memory. Loads and saves copy, so a caller's later
 * mutations never leak into the stored snapshot.
 */
export class MemoryProfileSource implements WritableProfileSource {
  readonly name = "memory"
  readonly supportsSave = true as const

  private snapshot: ConfigurationDocument
  private saveCount = 0

  constructor(initial: ConfigurationDocument = emptyDocument()) {
    this.snapshot = cloneDocument(initial)
  }

  async load(): Promise<ConfigurationDocument> {
    return cloneDocument(this.snapshot)
  }

  async save(doc: ConfigurationDocument): Promise<void> {
    this.snapshot = cloneDocument(doc)
    this.saveCount += 1
  }

  /** Stored document, as the next `load()` would return it. */
  peek(): ConfigurationDocument {
    return cloneDocument(this.snapshot)
  }

  get saves(): number {
    return this.saveCount
  }
}
