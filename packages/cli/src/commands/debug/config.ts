import fs from "node:fs/promises"
import path from "node:path"
import { isFileMissing } from "@modeldeck/config"
import type { CommandContext } from "../../context"
import { dumpConfiguration } from "../../format/mask"

export type DebugConfigOptions = {
  verbose?: boolean
}

export async function debugConfigCommand(
  ctx: CommandContext,
  options: DebugConfigOptions,
): Promise<void> {
  const config = await ctx.manager.getConfig()

  ctx.io.writeStdout(
    `Current configuration:\n${dumpConfiguration(config, { verbose: options.verbose ?? false })}`,
  )

  const found = await fileExists(ctx.configPath)

  ctx.io.writeStdout(`Config file ${found ? "found" : "not found"} at: ${ctx.configPath}\n`)
  ctx.io.writeStdout(`Config directory: ${path.dirname(ctx.configPath)}\n`)
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.stat(file)
    return true
  } catch (err) {
    if (isFileMissing(err)) return false
    throw err
  }
}
