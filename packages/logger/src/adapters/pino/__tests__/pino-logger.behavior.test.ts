import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeRecordDestination() {
  const records: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) {
        const record: Record<string, unknown> = JSON.parse(line)
        records.push(record)
      }
      callback()
    },
  })

  return { records, destination }
}

describe("PinoLogger behavior", () => {
  it("emits one JSON record per entry to the destination", () => {
    const { records, destination } = makeRecordDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { prefix: "shop" },
    )

    logger.info("Configuration assembled", { layers: 4 })

    expect(records).toHaveLength(1)
    expect(records[0]).toMatchObject({
      level: 30,
      msg: "Configuration assembled",
      prefix: "shop",
      layers: 4,
    })
    expect(typeof records[0]?.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { records, destination } = makeRecordDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { prefix: "shop" },
    )
    const child = base.child({ layer: "overrides" })

    child.info("ignored")
    child.warn("Unknown configuration key")

    expect(records).toHaveLength(1)
    expect(records[0]).toMatchObject({
      msg: "Unknown configuration key",
      prefix: "shop",
      layer: "overrides",
    })
  })

  it("serializes err with its cause chain", () => {
    const { records, destination } = makeRecordDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const err = new Error("could not read shop-configuration.yaml", {
      cause: new Error("permission denied"),
    })

    logger.error("Configuration assembly failed", { err })

    expect(records[0]).toMatchObject({
      err: {
        type: "Error",
        message: "could not read shop-configuration.yaml",
        cause: { message: "permission denied" },
      },
    })
  })
})
