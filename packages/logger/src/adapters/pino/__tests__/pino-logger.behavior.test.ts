import { Writable } from "node:stream"
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

function parseLine(lines: string[], index: number): Record<string, unknown> {
  const line = lines[index]
  if (line === undefined) throw new Error(`no log line at index ${index}`)

  return JSON.parse(line)
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { module: "config" },
    )

    logger.debug("Opening config file", { file: "/srv/app/app.yaml" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines, 0)

    expect(payload).toMatchObject({
      msg: "Opening config file",
      module: "config",
      file: "/srv/app/app.yaml",
      level: 20,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { module: "defaults" },
    )
    const child = base.child({ kind: "datastore" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines, 0)).toMatchObject({
      msg: "logged",
      module: "defaults",
      kind: "datastore",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })
    const cause = new Error("ENOENT")

    logger.error("include failed", { err: new Error("unresolved", { cause }) })

    const payload = parseLine(lines, 0)

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "unresolved",
      cause: { type: "Error", message: "ENOENT" },
    })
  })

  it("ignores the pretty transport when a destination is supplied", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info", prettify: true })

    logger.info("plain json")

    expect(parseLine(lines, 0)).toMatchObject({ msg: "plain json" })
  })
})
