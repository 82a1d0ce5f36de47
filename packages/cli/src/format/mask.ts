import { type ConfigurationDocument, type Profile, setEntry } from "@modeldeck/config"
import { stringify } from "yaml"

export const MASKED_API_KEY = "sk-***"

export type MaskedProfile = Omit<Profile, "api_key"> & { api_key: string | null }

/**
 * Hides a secret for display: non-empty values become `sk-***`, empty ones
 * `null`.
 */
export function maskApiKey(value: string | undefined): string | null {
  return value ? MASKED_API_KEY : null
}

export function maskProfile(profile: Profile): MaskedProfile {
  return { ...profile, api_key: maskApiKey(profile.api_key) }
}

/**
 * YAML rendering of the whole document, api keys masked unless `verbose`.
 */
export function dumpConfiguration(
  doc: ConfigurationDocument,
  options: { verbose?: boolean } = {},
): string {
  if (doc.default_profile === null && Object.keys(doc.profiles).length === 0) {
    return "No configuration found.\n"
  }

  if (options.verbose) return stringify(doc)

  const profiles: Record<string, MaskedProfile> = {}
  for (const [name, profile] of Object.entries(doc.profiles)) {
    setEntry(profiles, name, maskProfile(profile))
  }

  return stringify({ default_profile: doc.default_profile, profiles })
}

/**
 * `NAME=value` lines for every set variable starting with `prefix`, sorted by
 * name, with `*API_KEY*` values masked.
 */
export function describeEnvironment(
  env: Record<string, string | undefined>,
  prefix: string,
): string[] {
  return Object.keys(env)
    .filter((name) => name.startsWith(prefix))
    .sort()
    .flatMap((name) => {
      const value = env[name]
      if (value === undefined) return []

      const shown = name.includes("API_KEY") ? String(maskApiKey(value)) : value
      return [`${name}=${shown}`]
    })
}
