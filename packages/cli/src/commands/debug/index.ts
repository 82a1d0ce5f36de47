import type { Command } from "commander"
import type { CliDeps } from "../../context"
import { runWithContext } from "../../run-command"
import { type DebugConfigOptions, debugConfigCommand } from "./config"
import { debugInfoCommand } from "./info"

export function registerDebugCommands(program: Command, deps: CliDeps): void {
  const debug = program.command("debug").description("Debug and troubleshooting commands")

  debug
    .command("config")
    .description("Display the current configuration")
    .option("-v, --verbose", "Show sensitive information like API keys")
    .action(async (options: DebugConfigOptions, command: Command) => {
      await runWithContext(deps, command, (ctx) => debugConfigCommand(ctx, options))
    })

  debug
    .command("info")
    .description("Display system and environment information")
    .action(async (_options: unknown, command: Command) => {
      await runWithContext(deps, command, debugInfoCommand)
    })
}
