import { ConfigError } from "@modeldeck/config"
import type { CommandContext } from "../../context"
import { parseParamPairs } from "../../format/params"
import { assertWritable, profileExists } from "./guards"

export type ProfileFieldOptions = {
  provider?: string
  model?: string
  apiKey?: string
  param: string[]
}

export async function addProfileCommand(
  ctx: CommandContext,
  name: string,
  options: ProfileFieldOptions,
): Promise<void> {
  assertWritable(ctx.manager, "add")

  if (await profileExists(ctx.manager, name)) {
    throw ConfigError.alreadyExists(name)
  }

  const params = parseParamPairs(options.param)
  const provider = options.provider ?? (await ctx.prompter.ask("Provider"))
  const model = options.model ?? (await ctx.prompter.ask("Model"))
  const apiKey = options.apiKey ?? (await ctx.prompter.secret("API key"))

  await ctx.manager.addProfile(name, { provider, model, apiKey, params })
  ctx.io.writeStdout(`Profile '${name}' added.\n`)
}
