import { stringify } from "yaml"
import type { CommandContext } from "../../context"
import { maskProfile } from "../../format/mask"

export type ShowProfileOptions = {
  verbose?: boolean
}

export async function showProfileCommand(
  ctx: CommandContext,
  name: string | undefined,
  options: ShowProfileOptions,
): Promise<void> {
  const { name: resolved, ...profile } = await ctx.manager.getProfile(name)

  ctx.io.writeStdout(stringify({ [resolved]: options.verbose ? profile : maskProfile(profile) }))
}
