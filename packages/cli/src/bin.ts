#!/usr/bin/env -S node --import tsx
import { createProcessIO } from "./io/process-io"
import { ReadlinePrompter } from "./io/prompter"
import { runCli } from "./program"

await runCli(process.argv.slice(2), {
  io: createProcessIO(),
  prompter: new ReadlinePrompter({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY && process.stdout.isTTY,
  }),
})
