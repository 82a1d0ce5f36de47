import type { CommandContext } from "../../context"
import { assertWritable, notFoundMessage, profileExists } from "./guards"

export async function setDefaultProfileCommand(ctx: CommandContext, name: string): Promise<void> {
  assertWritable(ctx.manager, "set_default")

  if (!(await profileExists(ctx.manager, name))) {
    ctx.io.writeStdout(notFoundMessage(name))
    return
  }

  await ctx.manager.setDefault(name)
  ctx.io.writeStdout(`Default profile set to '${name}'.\n`)
}
