import os from "node:os"
import path from "node:path"
import {
  createProfileManager,
  createProfileSource,
  type IProfileManager,
} from "@modeldeck/config"
import {
  createPinoLogger,
  type Logger,
  type LoggerOptions,
} from "@modeldeck/logger"
import type { CliIO } from "./io/process-io"
import type { Prompter } from "./io/prompter"
import { loadCliSettings } from "./settings"

export type RuntimeInfo = {
  nodeVersion: string
  platform: string
  cwd: string
}

export type CliDeps = {
  io: CliIO
  prompter: Prompter

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** @default os.homedir() */
  homeDir?: string

  /** @default the running process */
  runtime?: RuntimeInfo

  /** @default pino writing to stderr */
  createLogger?: (options: LoggerOptions) => Logger
}

export type GlobalOptions = {
  debug?: boolean
  configSource: string
  configPath?: string
}

export type CommandContext = {
  io: CliIO
  prompter: Prompter
  logger: Logger
  manager: IProfileManager
  /** Absolute path of the YAML configuration file, whichever source is active. */
  configPath: string
  env: Record<string, string | undefined>
  runtime: RuntimeInfo
}

export function currentRuntime(): RuntimeInfo {
  return {
    nodeVersion: process.version,
    platform: `${process.platform}-${process.arch}`,
    cwd: process.cwd(),
  }
}

export function createCommandContext(
  deps: CliDeps,
  globals: GlobalOptions,
  command: string,
): CommandContext {
  const env = deps.env ?? process.env
  const runtime = deps.runtime ?? currentRuntime()
  const settings = loadCliSettings({
    env,
    homeDir: deps.homeDir ?? os.homedir(),
    cwd: runtime.cwd,
  })

  const createLogger =
    deps.createLogger ?? ((options: LoggerOptions) => createPinoLogger({ destination: 2 }, options))
  const logger = createLogger({
    level: globals.debug ? "debug" : settings.logLevel,
    prettify: settings.prettyLogs,
  }).child({ command })

  const configPath = globals.configPath
    ? path.resolve(runtime.cwd, globals.configPath)
    : settings.configPath

  const source = createProfileSource(globals.configSource, {
    configPath,
    env,
    dotenvFile: settings.dotenvPath,
    logger,
  })

  logger.debug("Using profile source", { source: source.name })

  return {
    io: deps.io,
    prompter: deps.prompter,
    logger,
    manager: createProfileManager(source, { logger }),
    configPath,
    env,
    runtime,
  }
}
