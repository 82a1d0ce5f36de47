import type { Profile, ProfileUpdate } from "@modeldeck/config"
import type { CommandContext } from "../../context"
import type { Prompter } from "../../io/prompter"
import { parseParamPairs } from "../../format/params"
import type { ProfileFieldOptions } from "./add"
import { assertWritable, notFoundMessage } from "./guards"

export async function editProfileCommand(
  ctx: CommandContext,
  name: string,
  options: ProfileFieldOptions,
): Promise<void> {
  assertWritable(ctx.manager, "edit")

  const config = await ctx.manager.getConfig()
  const current = Object.hasOwn(config.profiles, name) ? config.profiles[name] : undefined

  if (!current) {
    ctx.io.writeStdout(notFoundMessage(name))
    return
  }

  const update = hasFieldFlags(options)
    ? updateFromFlags(current, options)
    : await promptForUpdate(ctx.prompter, current)

  await ctx.manager.editProfile(name, update)
  ctx.io.writeStdout(`Profile '${name}' updated.\n`)
}

function hasFieldFlags(options: ProfileFieldOptions): boolean {
  return (
    options.provider !== undefined ||
    options.model !== undefined ||
    options.apiKey !== undefined ||
    options.param.length > 0
  )
}

// --param merges into the stored params instead of replacing them
function updateFromFlags(current: Profile, options: ProfileFieldOptions): ProfileUpdate {
  return {
    ...(options.provider !== undefined && { provider: options.provider }),
    ...(options.model !== undefined && { model: options.model }),
    ...(options.apiKey !== undefined && { apiKey: options.apiKey }),
    ...(options.param.length > 0 && {
      params: { ...current.params, ...parseParamPairs(options.param) },
    }),
  }
}

async function promptForUpdate(prompter: Prompter, current: Profile): Promise<ProfileUpdate> {
  const provider = await prompter.ask("Provider", { default: current.provider })
  const model = await prompter.ask("Model", { default: current.model })
  const apiKey = await prompter.secret("API key (leave blank to keep)")

  return { provider, model, ...(apiKey !== "" && { apiKey }) }
}
