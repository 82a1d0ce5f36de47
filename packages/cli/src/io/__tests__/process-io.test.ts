import { Writable } from "node:stream"
import { createProcessIO } from "../process-io"

function sink() {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    },
  })
  return { stream, text: () => chunks.join("") }
}

describe("createProcessIO", () => {
  it("writes to the process streams and sets the exit code", () => {
    const stdout = sink()
    const stderr = sink()
    const proc = { stdout: stdout.stream, stderr: stderr.stream, exitCode: 0 }

    const io = createProcessIO(proc)
    io.writeStdout("out\n")
    io.writeStderr("err\n")
    io.setExitCode(3)

    expect(stdout.text()).toBe("out\n")
    expect(stderr.text()).toBe("err\n")
    expect(proc.exitCode).toBe(3)
  })
})
