import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { CliConfig } from "./config"

export type CliLoggerOptions = {
  level: CliConfig["LOG_LEVEL"]

  /** Human-readable output through pino-pretty; for local use */
  prettify?: boolean
}

const STDERR = 2

/**
 * Logger for the CLI. Writes to stderr so stdout carries only command output.
 *
 * @param destination - Overrides the sink; `prettify` is ignored when given.
 */
export function createLogger(opts: CliLoggerOptions, destination?: DestinationStream): Logger {
  const pinoOpts: LoggerOptions = {
    name: "lexid",
    level: opts.level,
    serializers: { err: errWithCause },
  }

  if (destination) return pino(pinoOpts, destination)

  if (opts.prettify) {
    return pino({
      ...pinoOpts,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "hostname,pid",
          destination: STDERR,
        },
      },
    })
  }

  return pino(pinoOpts, pino.destination(STDERR))
}
