/**
 * Output side of the CLI. Commands never touch `process` directly so they
 * can be driven in-process by tests.
 */
export type CliIO = {
  writeStdout(message: string): void
  writeStderr(message: string): void
  setExitCode(code: number): void
}

type NodeLikeProcess = {
  stdout: Pick<NodeJS.WritableStream, "write">
  stderr: Pick<NodeJS.WritableStream, "write">
  exitCode?: number | string | null | undefined
}

export function createProcessIO(proc: NodeLikeProcess = process): CliIO {
  return {
    writeStdout(message) {
      proc.stdout.write(message)
    },
    writeStderr(message) {
      proc.stderr.write(message)
    },
    setExitCode(code) {
      proc.exitCode = code
    },
  }
}
