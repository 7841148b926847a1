import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { z } from "zod"

export const logLevels = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const

export const cliConfigSchema = z.object({
  LOG_LEVEL: z.enum(logLevels).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type CliConfig = z.infer<typeof cliConfigSchema>

export type LoadCliConfigOptions = {
  /**
   * Only keys starting with this prefix are read; the prefix is stripped.
   * @default "LEXID_"
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /**
   * Optional dotenv file, overridden by `env`.
   * Relative to `cwd`. A missing file is ignored.
   * @default ".env"
   */
  dotenvFile?: string

  /** @default process.cwd() */
  cwd?: string
}

async function readDotenv(filePath: string): Promise<Record<string, string>> {
  try {
    return parse(await fs.readFile(filePath, "utf-8"))
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return {}
    throw err
  }
}

function withPrefix(
  values: Record<string, string | undefined>,
  prefix: string,
): Record<string, string> {
  const filtered: Record<string, string> = {}

  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}

/**
 * Load CLI configuration: dotenv file first, then the environment on top.
 *
 * @throws Error listing every invalid key
 */
export async function loadCliConfig(options: LoadCliConfigOptions = {}): Promise<CliConfig> {
  const prefix = options.prefix ?? "LEXID_"
  const cwd = options.cwd ?? process.cwd()
  const dotenvPath = path.resolve(cwd, options.dotenvFile ?? ".env")

  const merged = {
    ...withPrefix(await readDotenv(dotenvPath), prefix),
    ...withPrefix(options.env ?? process.env, prefix),
  }

  const result = cliConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return result.data
}
