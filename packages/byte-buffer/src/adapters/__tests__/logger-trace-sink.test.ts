import { Writable } from "node:stream"
import { createNullLogger, type LogLevelName, PinoLogger } from "@wirebuf/logger"
import { ByteBuffer } from "../../core/byte-buffer"
import { createLoggerTraceSink } from "../logger-trace-sink"

function capture(level: LogLevelName) {
  const lines: Record<string, unknown>[] = []
  const destination = new Writable({
    write(chunk, _, cb) {
      lines.push(JSON.parse(chunk.toString()))
      cb()
    },
  })

  return { logger: new PinoLogger({ destination }, { level, prettify: false }), lines }
}

describe("LoggerTraceSink", () => {
  it("writes dumps at trace level scoped to the byte-buffer module", () => {
    const { logger, lines } = capture("trace")
    const buffer = ByteBuffer.from(Uint8Array.of(0x0a, 0x0b), {}, {
      trace: createLoggerTraceSink(logger),
    })

    buffer.hexLike()

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 10,
      msg: "byte buffer storage",
      module: "byte-buffer",
      size: 2,
      dump: "0a 0b",
    })
  })

  it("keeps bindings of the parent logger", () => {
    const { logger, lines } = capture("trace")
    const sink = createLoggerTraceSink(logger.child({ connectionId: "conn-1" }))

    sink.trace("byte buffer storage", { size: 0, dump: "" })

    expect(lines[0]).toMatchObject({ connectionId: "conn-1", module: "byte-buffer" })
  })

  it("is disabled above trace level", () => {
    const { logger, lines } = capture("info")
    const sink = createLoggerTraceSink(logger)
    const buffer = ByteBuffer.from(Uint8Array.of(1), {}, { trace: sink })

    buffer.printStorage()

    expect(sink.isTraceEnabled()).toBe(false)
    expect(lines).toHaveLength(0)
  })

  it("is never enabled for a null logger", () => {
    expect(createLoggerTraceSink(createNullLogger()).isTraceEnabled()).toBe(false)
  })
})
