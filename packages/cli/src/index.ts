export {
  type CliDeps,
  type CommandContext,
  createCommandContext,
  currentRuntime,
  type GlobalOptions,
  type RuntimeInfo,
} from "./context"
export { CliError, type CliErrorCode } from "./errors"
export { type CliIO, createProcessIO } from "./io/process-io"
export {
  type PromptOptions,
  type Prompter,
  ReadlinePrompter,
  type ReadlinePrompterOptions,
} from "./io/prompter"
export { CLI_NAME, CLI_VERSION, createProgram, runCli } from "./program"
export { type CliSettings, cliEnvSchema, loadCliSettings } from "./settings"
