import { Writable } from "node:stream"
import { BaseError } from "@modeldeck/errors"

import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("emits one JSON line per entry with context and meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "debug" }, { source: "env" })

    logger.debug("config loaded", { profile: "env-profile" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0])

    expect(payload).toMatchObject({
      msg: "config loaded",
      level: 20,
      source: "env",
      profile: "env-profile",
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() shares the parent's sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" })
    const child = base.child({ command: "config edit" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({ msg: "logged", command: "config edit" })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })
    const err = new BaseError("write failed", {
      code: "io_error",
      cause: new Error("EACCES"),
    })

    logger.error("save failed", { err })

    const payload = parseLine(lines[0])

    expect(payload.err).toMatchObject({
      type: "BaseError",
      message: "write failed",
      code: "io_error",
      cause: { type: "Error", message: "EACCES" },
    })
  })
})
