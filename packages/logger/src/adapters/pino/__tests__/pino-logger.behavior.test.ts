import { Writable } from "node:stream"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("writes JSON lines with msg, time and numeric level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "regionkit.cache" })

    logger.info("region configured", { backend: "regionkit.dict" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "region configured",
      module: "regionkit.cache",
      backend: "regionkit.dict",
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })

    logger.error("backend failed", { err: new Error("outer", { cause: new Error("inner") }) })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { message: "inner" },
    })
  })

  it("child() shares the parent's destination and level", () => {
    const { lines, destination } = makeLineDestination()

    const child = new PinoLogger({ destination }, { level: "warn" }).child({ region: "users" })

    child.info("ignored")
    child.warn("kept")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ msg: "kept", region: "users" })
  })
})
