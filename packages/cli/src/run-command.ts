import { toAppError } from "@modeldeck/errors"
import type { Command } from "commander"
import {
  type CliDeps,
  type CommandContext,
  createCommandContext,
  type GlobalOptions,
} from "./context"

/**
 * Builds the context from the global flags, then runs `handler`. Failures are
 * logged (operational ones at debug) and rethrown for `runCli` to report.
 */
export async function runWithContext(
  deps: CliDeps,
  command: Command,
  handler: (ctx: CommandContext) => Promise<void>,
): Promise<void> {
  const ctx = createCommandContext(
    deps,
    command.optsWithGlobals<GlobalOptions>(),
    commandPath(command),
  )

  try {
    await handler(ctx)
  } catch (err) {
    const appError = toAppError(err)

    if (appError.isOperational) {
      ctx.logger.debug("Command failed", { err: appError })
    } else {
      ctx.logger.error("Command failed", { err: appError })
    }

    throw appError
  }
}

/** "config add" for `modeldeck config add`; the program name is left out. */
export function commandPath(command: Command): string {
  const names: string[] = []

  for (let current: Command | null = command; current?.parent; current = current.parent) {
    names.unshift(current.name())
  }

  return names.join(" ")
}
