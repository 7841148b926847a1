import {
  Fragment,
  FullReference,
  Nsid,
  type NsidErrorCode,
  type NsidErrorReason,
  type ParseResult,
  safeParseReference,
} from "@lexid/nsid"
import type { Logger } from "pino"

export const checkKinds = ["nsid", "fragment", "full", "reference"] as const

export type CheckKind = (typeof checkKinds)[number]

export type CheckOutcome =
  | { readonly input: string; readonly valid: true; readonly kind: string }
  | {
      readonly input: string
      readonly valid: false
      readonly code: NsidErrorCode
      readonly reason: NsidErrorReason
    }

export type CheckOptions = {
  kind: CheckKind
  json: boolean
}

export type CheckIo = {
  write: (line: string) => void
  logger: Logger
}

export function isCheckKind(value: string): value is CheckKind {
  const kinds: readonly string[] = checkKinds

  return kinds.includes(value)
}

function parseAs(kind: CheckKind, input: string): ParseResult<{ kind: string }> {
  switch (kind) {
    case "nsid": {
      const result = Nsid.safeParse(input)
      return result.ok ? { ok: true, value: { kind } } : result
    }
    case "fragment": {
      const result = Fragment.safeParse(input)
      return result.ok ? { ok: true, value: { kind } } : result
    }
    case "full": {
      const result = FullReference.safeParse(input)
      return result.ok ? { ok: true, value: { kind } } : result
    }
    case "reference": {
      const result = safeParseReference(input)
      return result.ok ? { ok: true, value: { kind: result.value.kind } } : result
    }
  }
}

export function checkInput(input: string, kind: CheckKind): CheckOutcome {
  const result = parseAs(kind, input)

  if (result.ok) return { input, valid: true, kind: result.value.kind }

  return { input, valid: false, code: result.error.code, reason: result.error.reason }
}

export function formatOutcome(outcome: CheckOutcome, json: boolean): string {
  if (json) return JSON.stringify(outcome)

  if (outcome.valid) return `ok      ${outcome.input}`

  return `invalid ${outcome.input} (${outcome.code}: ${outcome.reason})`
}

/**
 * Validate every input and write one line per input.
 *
 * @returns process exit code: 0 if every input is valid, 1 otherwise
 */
export function runCheck(inputs: readonly string[], opts: CheckOptions, io: CheckIo): number {
  let invalid = 0

  for (const input of inputs) {
    const outcome = checkInput(input, opts.kind)

    if (!outcome.valid) {
      invalid++
      io.logger.debug({ input, code: outcome.code, reason: outcome.reason }, "rejected input")
    }

    io.write(formatOutcome(outcome, opts.json))
  }

  io.logger.info({ kind: opts.kind, total: inputs.length, invalid }, "check complete")

  return invalid === 0 ? 0 : 1
}

/**
 * One input per non-empty line; surrounding whitespace is dropped.
 */
export function splitInputLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "")
}
