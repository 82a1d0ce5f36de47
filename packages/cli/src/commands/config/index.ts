import type { Command } from "commander"
import type { CliDeps } from "../../context"
import { runWithContext } from "../../run-command"
import { addProfileCommand, type ProfileFieldOptions } from "./add"
import { setDefaultProfileCommand } from "./default"
import { type DeleteProfileOptions, deleteProfileCommand } from "./delete"
import { editProfileCommand } from "./edit"
import { listProfilesCommand } from "./list"
import { type ShowProfileOptions, showProfileCommand } from "./show"

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function withProfileFields(command: Command): Command {
  return command
    .option("--provider <provider>", "Provider name (e.g. openai, anthropic, openrouter)")
    .option("--model <model>", "Model name (e.g. gpt-4)")
    .option("--api-key <key>", "API key, or ${VAR} to read it from the environment on load")
    .option("--param <key=value>", "Model parameter; repeat for more than one", collect, [])
}

export function registerConfigCommands(program: Command, deps: CliDeps): void {
  const config = program.command("config").description("Manage configuration profiles")

  withProfileFields(config.command("add <name>"))
    .description("Add a profile, prompting for missing fields")
    .action(async (name: string, options: ProfileFieldOptions, command: Command) => {
      await runWithContext(deps, command, (ctx) => addProfileCommand(ctx, name, options))
    })

  withProfileFields(config.command("edit <name>"))
    .description("Edit a profile; prompts for every field when no flag is given")
    .action(async (name: string, options: ProfileFieldOptions, command: Command) => {
      await runWithContext(deps, command, (ctx) => editProfileCommand(ctx, name, options))
    })

  config
    .command("delete <name>")
    .description("Delete a profile")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(async (name: string, options: DeleteProfileOptions, command: Command) => {
      await runWithContext(deps, command, (ctx) => deleteProfileCommand(ctx, name, options))
    })

  config
    .command("default <name>")
    .description("Set the default profile")
    .action(async (name: string, _options: unknown, command: Command) => {
      await runWithContext(deps, command, (ctx) => setDefaultProfileCommand(ctx, name))
    })

  config
    .command("list")
    .description("List profiles; * marks the default")
    .action(async (_options: unknown, command: Command) => {
      await runWithContext(deps, command, listProfilesCommand)
    })

  config
    .command("show [name]")
    .description("Show one profile, the default when no name is given")
    .option("-v, --verbose", "Show the API key")
    .action(async (name: string | undefined, options: ShowProfileOptions, command: Command) => {
      await runWithContext(deps, command, (ctx) => showProfileCommand(ctx, name, options))
    })
}
