import type { CommandContext } from "../../context"
import { assertWritable, notFoundMessage, profileExists } from "./guards"

export type DeleteProfileOptions = {
  yes?: boolean
}

export async function deleteProfileCommand(
  ctx: CommandContext,
  name: string,
  options: DeleteProfileOptions,
): Promise<void> {
  assertWritable(ctx.manager, "delete")

  if (!(await profileExists(ctx.manager, name))) {
    ctx.io.writeStdout(notFoundMessage(name))
    return
  }

  if (!options.yes) {
    const confirmed = await ctx.prompter.confirm(
      `Are you sure you want to delete profile '${name}'?`,
      false,
    )

    if (!confirmed) {
      ctx.io.writeStdout("Aborted.\n")
      return
    }
  }

  await ctx.manager.deleteProfile(name)
  ctx.io.writeStdout(`Profile '${name}' deleted.\n`)
}
