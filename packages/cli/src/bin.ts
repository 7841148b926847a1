#!/usr/bin/env node
import { text } from "node:stream/consumers"
import { loadCliConfig } from "./config"
import { createLogger } from "./logger"
import { createProgram } from "./program"

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return ""

  return text(process.stdin)
}

async function main(): Promise<void> {
  const config = await loadCliConfig()
  const logger = createLogger({ level: config.LOG_LEVEL, prettify: config.LOG_PRETTY })

  const program = createProgram({
    write: (line) => process.stdout.write(`${line}\n`),
    logger,
    readStdin,
    setExitCode: (code) => {
      process.exitCode = code
    },
  })

  await program.parseAsync(process.argv)
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`)
  process.exitCode = 1
})
