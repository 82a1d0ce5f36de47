import { z } from "zod"

// YAML reads `model: 4` or an unquoted numeric key as a number.
const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? "" : String(value)))

export const profileParamsSchema = z
  .record(z.string(), z.unknown())
  .nullish()
  .transform((value) => value ?? {})

export const profileSchema = z.object({
  provider: text,
  model: text,
  api_key: text,
  params: profileParamsSchema,
})

/**
 * On-disk shape of the configuration file. Absent or `null` keys fall back to
 * their empty value so a hand-edited file with `api_key:` still loads.
 */
export const configurationDocumentSchema = z.object({
  default_profile: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  profiles: z
    .custom<Record<string, unknown> | null | undefined>(
      (value) => value == null || (typeof value === "object" && !Array.isArray(value)),
      "Expected a mapping of profiles",
    )
    .transform((value, ctx) => {
      const profiles: Record<string, z.output<typeof profileSchema>> = {}
      for (const [name, raw] of Object.entries(value ?? {})) {
        const result = profileSchema.safeParse(raw)
        if (!result.success) {
          for (const issue of result.error.issues) {
            ctx.addIssue({ code: "custom", message: issue.message, path: [name, ...issue.path] })
          }
          continue
        }
        setEntry(profiles, name, result.data)
      }
      return profiles
    }),
})

export type ProfileParams = Record<string, unknown>

export type Profile = z.infer<typeof profileSchema>

export type ConfigurationDocument = z.infer<typeof configurationDocumentSchema>

/**
 * Stores `value` as an own property. Plain assignment would treat a profile
 * named `__proto__` as a prototype change and the entry would vanish.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}

export function emptyDocument(): ConfigurationDocument {
  return { default_profile: null, profiles: {} }
}

export function cloneDocument(doc: ConfigurationDocument): ConfigurationDocument {
  return structuredClone(doc)
}
