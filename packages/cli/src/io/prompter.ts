import * as readline from "node:readline/promises"
import { Writable } from "node:stream"

export type PromptOptions = {
  /** Returned when the answer is empty; shown in brackets after the question. */
  default?: string
}

export interface Prompter {
  ask(question: string, options?: PromptOptions): Promise<string>

  /** Like `ask`, without echoing what is typed. */
  secret(question: string, options?: PromptOptions): Promise<string>

  confirm(question: string, defaultValue?: boolean): Promise<boolean>

  close(): void
}

export type ReadlinePrompterOptions = {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream

  /**
   * Set when input and output are a terminal, so readline takes over echoing
   * and `secret` can hide keystrokes.
   *
   * @default false
   */
  terminal?: boolean
}

class MutableOutput extends Writable {
  muted = false

  constructor(private readonly target: NodeJS.WritableStream) {
    super()
  }

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (!this.muted) this.target.write(chunk)
    callback()
  }
}

/**
 * Line-based prompts over node:readline. The interface is opened on the first
 * question, so commands that never prompt leave stdin alone.
 */
export class ReadlinePrompter implements Prompter {
  private readonly output: MutableOutput
  private rl: readline.Interface | undefined

  constructor(private readonly opts: ReadlinePrompterOptions) {
    this.output = new MutableOutput(opts.output)
  }

  async ask(question: string, options: PromptOptions = {}): Promise<string> {
    const answer = await this.interface().question(formatQuestion(question, options))

    return answer.trim() || (options.default ?? "")
  }

  async secret(question: string, options: PromptOptions = {}): Promise<string> {
    const rl = this.interface()

    this.opts.output.write(formatQuestion(question, {}))
    this.output.muted = true

    try {
      const answer = await rl.question("")
      return answer.trim() || (options.default ?? "")
    } finally {
      this.output.muted = false
      this.opts.output.write("\n")
    }
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? "[Y/n]" : "[y/N]"

    for (;;) {
      const answer = (await this.interface().question(`${question} ${hint}: `))
        .trim()
        .toLowerCase()

      if (answer === "") return defaultValue
      if (answer === "y" || answer === "yes") return true
      if (answer === "n" || answer === "no") return false

      this.opts.output.write("Please answer y or n.\n")
    }
  }

  close(): void {
    this.rl?.close()
    this.rl = undefined
  }

  private interface(): readline.Interface {
    this.rl ??= readline.createInterface({
      input: this.opts.input,
      output: this.output,
      terminal: this.opts.terminal ?? false,
    })
    return this.rl
  }
}

function formatQuestion(question: string, options: PromptOptions): string {
  return options.default ? `${question} [${options.default}]: ` : `${question}: `
}
