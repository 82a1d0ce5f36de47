import { DEFAULT_ENV_PREFIX } from "@modeldeck/config"
import type { CommandContext } from "../../context"
import { describeEnvironment } from "../../format/mask"

export async function debugInfoCommand(ctx: CommandContext): Promise<void> {
  const { runtime } = ctx
  const variables = describeEnvironment(ctx.env, DEFAULT_ENV_PREFIX)

  const lines = [
    "System Information:",
    `Node.js version: ${runtime.nodeVersion}`,
    `Platform: ${runtime.platform}`,
    `Working directory: ${runtime.cwd}`,
    ...(variables.length > 0
      ? ["MODELDECK environment variables:", ...variables.map((line) => `  ${line}`)]
      : ["No MODELDECK environment variables found."]),
  ]

  ctx.io.writeStdout(`${lines.join("\n")}\n`)
}
