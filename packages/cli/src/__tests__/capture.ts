import { Writable } from "node:stream"
import type { Logger } from "pino"
import { createLogger, type CliLoggerOptions } from "../logger"

export function makeLineDestination() {
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

export function captureLogger(level: CliLoggerOptions["level"] = "trace"): {
  logger: Logger
  entries: () => Record<string, unknown>[]
} {
  const { lines, destination } = makeLineDestination()

  return {
    logger: createLogger({ level }, destination),
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  }
}
