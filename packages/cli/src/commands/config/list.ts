import type { CommandContext } from "../../context"
import { formatProfileTable } from "../../format/table"

export async function listProfilesCommand(ctx: CommandContext): Promise<void> {
  const profiles = await ctx.manager.listProfiles()

  if (profiles.length === 0) {
    ctx.io.writeStdout("No profiles configured. Run 'modeldeck config add <name>' to create one.\n")
    return
  }

  ctx.io.writeStdout(formatProfileTable(profiles))
}
