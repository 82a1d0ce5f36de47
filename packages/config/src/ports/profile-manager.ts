import type { ConfigurationDocument, Profile, ProfileParams } from "../model/document"
import type { ProfileSource } from "./source"

export type NewProfileInput = {
  provider: string
  model: string
  apiKey: string
  /** @default {} */
  params?: ProfileParams
}

/**
 * Fields to overwrite on an existing profile. `undefined` keeps the stored
 * value; `params`, when given, replaces the whole mapping.
 */
export type ProfileUpdate = Partial<NewProfileInput>

export type ResolvedProfile = Profile & { name: string }

export type ProfileSummary = {
  name: string
  provider: string
  model: string
  isDefault: boolean
}

/**
 * Profile CRUD over a cached ConfigurationDocument.
 *
 * The document is loaded from the source on first use and kept for the life
 * of the instance. Every successful mutation is persisted before it resolves.
 */
export interface IProfileManager {
  readonly source: ProfileSource

  getConfig(): Promise<ConfigurationDocument>

  /**
   * Resolve a profile by name, or the default profile when `name` is omitted.
   * Rejects with `not_found` when there is no such profile.
   */
  getProfile(name?: string): Promise<ResolvedProfile>

  listProfiles(): Promise<ProfileSummary[]>

  addProfile(name: string, input: NewProfileInput): Promise<void>

  editProfile(name: string, update: ProfileUpdate): Promise<void>

  deleteProfile(name: string): Promise<void>

  setDefault(name: string): Promise<void>

  save(): Promise<void>
}
