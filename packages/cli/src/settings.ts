import path from "node:path"
import { defaultConfigPath, defaultDotenvPath } from "@modeldeck/config"
import { type LogLevelName, logLevelNames } from "@modeldeck/logger"
import { z } from "zod"
import { CliError } from "./errors"

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

export const cliEnvSchema = z.object({
  MODELDECK_CONFIG_PATH: z.string().min(1).optional(),
  MODELDECK_DOTENV_PATH: z.string().min(1).optional(),
  MODELDECK_LOG_LEVEL: z.enum(logLevelNames).optional(),
  MODELDECK_LOG_PRETTY: flag.optional(),
})

export type CliSettings = {
  configPath: string
  dotenvPath: string
  logLevel: LogLevelName
  prettyLogs: boolean
}

export type LoadCliSettingsOptions = {
  env: Record<string, string | undefined>
  homeDir: string
  cwd: string
}

/**
 * Reads the CLI's own settings from MODELDECK_* variables. Paths are resolved
 * against `cwd`.
 */
export function loadCliSettings({ env, homeDir, cwd }: LoadCliSettingsOptions): CliSettings {
  const result = cliEnvSchema.safeParse(env)

  if (!result.success) {
    throw CliError.invalidSettings(z.prettifyError(result.error), result.error)
  }

  const parsed = result.data

  return {
    configPath: path.resolve(cwd, parsed.MODELDECK_CONFIG_PATH ?? defaultConfigPath(homeDir)),
    dotenvPath: path.resolve(cwd, parsed.MODELDECK_DOTENV_PATH ?? defaultDotenvPath(homeDir)),
    logLevel: parsed.MODELDECK_LOG_LEVEL ?? "warn",
    prettyLogs: parsed.MODELDECK_LOG_PRETTY ?? false,
  }
}
