import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { createNullLogger, type Logger, type LoggerOptions } from "@modeldeck/logger"
import type { CliDeps, RuntimeInfo } from "../context"
import type { CliIO } from "../io/process-io"
import type { PromptOptions, Prompter } from "../io/prompter"
import { runCli } from "../program"

export type ScriptedAnswer = string | boolean

/**
 * Answers prompts from a fixed script, in order, and records every question.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = []
  closed = false

  constructor(private readonly answers: ScriptedAnswer[] = []) {}

  async ask(question: string, options: PromptOptions = {}): Promise<string> {
    return this.text(question, options)
  }

  async secret(question: string, options: PromptOptions = {}): Promise<string> {
    return this.text(question, options)
  }

  async confirm(question: string, _defaultValue?: boolean): Promise<boolean> {
    const answer = this.next(question)
    if (typeof answer !== "boolean") throw new Error(`Expected a yes/no answer for "${question}"`)
    return answer
  }

  close(): void {
    this.closed = true
  }

  private text(question: string, options: PromptOptions): string {
    const answer = this.next(question)
    if (typeof answer !== "string") throw new Error(`Expected a text answer for "${question}"`)
    return answer || (options.default ?? "")
  }

  private next(question: string): ScriptedAnswer {
    this.questions.push(question)
    const answer = this.answers.shift()
    if (answer === undefined) throw new Error(`No scripted answer for "${question}"`)
    return answer
  }
}

export function createTestIO() {
  const stdout: string[] = []
  const stderr: string[] = []
  let exitCode: number | undefined

  const io: CliIO = {
    writeStdout: (message) => {
      stdout.push(message)
    },
    writeStderr: (message) => {
      stderr.push(message)
    },
    setExitCode: (code) => {
      exitCode = code
    },
  }

  return {
    io,
    stdout: () => stdout.join(""),
    stderr: () => stderr.join(""),
    exitCode: () => exitCode,
  }
}

export type TestCliOptions = {
  home: string
  answers?: ScriptedAnswer[]
  env?: Record<string, string | undefined>
  createLogger?: (options: LoggerOptions) => Logger
}

export const testRuntime = (cwd: string): RuntimeInfo => ({
  nodeVersion: "v20.11.0",
  platform: "linux-x64",
  cwd,
})

export async function runTestCli(args: string[], options: TestCliOptions) {
  const { io, stdout, stderr } = createTestIO()
  const prompter = new ScriptedPrompter(options.answers)

  const deps: CliDeps = {
    io,
    prompter,
    env: options.env ?? {},
    homeDir: options.home,
    runtime: testRuntime(options.home),
    createLogger: options.createLogger ?? (() => createNullLogger()),
  }

  const exitCode = await runCli(args, deps)

  return { exitCode, stdout: stdout(), stderr: stderr(), prompter }
}

export async function makeHome(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "modeldeck-cli-test-"))
}

export function configFile(home: string): string {
  return path.join(home, ".modeldeck", "config.yaml")
}

export async function writeConfig(home: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(configFile(home)), { recursive: true })
  await fs.writeFile(configFile(home), content)
}

export async function readConfig(home: string): Promise<string> {
  return fs.readFile(configFile(home), "utf-8")
}

export const TWO_PROFILES = [
  "default_profile: p1",
  "profiles:",
  "  p1:",
  "    provider: openai",
  "    model: gpt-4",
  "    api_key: sk-1",
  "    params: {}",
  "  p2:",
  "    provider: anthropic",
  "    model: claude-test",
  "    api_key: ''",
  "    params:",
  "      temperature: 0.2",
  "",
].join("\n")
