import { profileSourceKinds } from "@modeldeck/config"
import { toAppError } from "@modeldeck/errors"
import { Command, CommanderError, Option } from "commander"
import { registerConfigCommands } from "./commands/config"
import { registerDebugCommands } from "./commands/debug"
import type { CliDeps } from "./context"

export const CLI_NAME = "modeldeck"
export const CLI_VERSION = "0.1.0"

export function createProgram(deps: CliDeps): Command {
  const program = new Command()

  program
    .name(CLI_NAME)
    .description("Manage named LLM provider profiles")
    .version(CLI_VERSION)
    .option("--debug", "Enable debug logging")
    .addOption(
      new Option("--config-source <source>", "Where profiles come from")
        .choices(profileSourceKinds)
        .default("yaml"),
    )
    .option("--config-path <path>", "YAML configuration file (default: ~/.modeldeck/config.yaml)")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.io.writeStdout(str),
      writeErr: (str) => deps.io.writeStderr(str),
    })

  registerConfigCommands(program, deps)
  registerDebugCommands(program, deps)

  return program
}

/**
 * Parses `argv` (without the node and script entries), runs the matching
 * command and returns the exit code, which is also set on `deps.io`.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps)
  let exitCode = 0

  try {
    await program.parseAsync([...argv], { from: "user" })
  } catch (err) {
    exitCode = reportFailure(deps, err)
  } finally {
    deps.prompter.close()
  }

  deps.io.setExitCode(exitCode)
  return exitCode
}

function reportFailure(deps: CliDeps, err: unknown): number {
  // commander has already written its own message
  if (err instanceof CommanderError) return err.exitCode

  deps.io.writeStderr(`Error: ${toAppError(err).message}\n`)
  return 1
}
