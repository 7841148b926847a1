export type NsidErrorCode = "nsid_format" | "nsid_fragment_format"

export type NsidFormatReason =
  | "empty"
  | "too_long"
  | "invalid_utf8"
  | "invalid_tld"
  | "invalid_domain_segment"
  | "invalid_name"
  | "authority_too_long"
  | "too_few_segments"

export type FragmentFormatReason = "missing_hash" | "invalid_length" | "invalid_character"

export type NsidErrorReason = NsidFormatReason | FragmentFormatReason

/**
 * Structured detail attached to every {@link NsidError}.
 *
 * @remarks
 * `reason` is diagnostic only. Callers branch on `code`; two inputs rejected
 * for different reasons are equally malformed.
 */
export type NsidErrorContext = Readonly<{
  input: string
  reason: NsidErrorReason
}>

/**
 * JSON-safe shape of an {@link NsidError}, for logs and API responses.
 */
export type SerializedNsidError = Readonly<{
  name: string
  code: NsidErrorCode
  message: string
  context: { input: string; reason: NsidErrorReason }
  isOperational: boolean
  isRetryable: boolean
}>

export type NsidErrorOptions = Readonly<{
  code: NsidErrorCode
  context: NsidErrorContext
  cause?: unknown
}>

export class NsidError extends Error {
  readonly code: NsidErrorCode
  readonly context: NsidErrorContext

  /** A malformed identifier stays malformed. */
  readonly isRetryable: boolean = false

  /** Bad input, not a bug. */
  readonly isOperational: boolean = true

  constructor(message: string, options: NsidErrorOptions) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  get reason(): NsidErrorReason {
    return this.context.reason
  }

  toJSON(): SerializedNsidError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isOperational: this.isOperational,
      isRetryable: this.isRetryable,
    }
  }
}

const NSID_REASONS: Record<NsidFormatReason, string> = {
  empty: "identifier is empty",
  too_long: "identifier is longer than 317 bytes",
  invalid_utf8: "identifier is not valid UTF-8",
  invalid_tld: "first segment is not a valid top-level domain",
  invalid_domain_segment: "domain segment is malformed",
  invalid_name: "name segment is malformed",
  authority_too_long: "domain authority is longer than 252 bytes",
  too_few_segments: "identifier needs at least 3 segments",
}

const FRAGMENT_REASONS: Record<FragmentFormatReason, string> = {
  missing_hash: "fragment must start with '#'",
  invalid_length: "fragment name length is out of range",
  invalid_character: "fragment name must be ASCII letters and digits",
}

export function nsidFormatError(
  input: string,
  reason: NsidFormatReason,
  cause?: unknown,
): NsidError {
  return new NsidError(`Invalid NSID "${input}": ${NSID_REASONS[reason]}`, {
    code: "nsid_format",
    context: { input, reason },
    ...(cause !== undefined && { cause }),
  })
}

export function fragmentFormatError(input: string, reason: FragmentFormatReason): NsidError {
  return new NsidError(`Invalid NSID fragment "${input}": ${FRAGMENT_REASONS[reason]}`, {
    code: "nsid_fragment_format",
    context: { input, reason },
  })
}

/**
 * Type guard for errors raised while parsing identifiers, fragments and references.
 */
export function isNsidError(e: unknown): e is NsidError {
  return e instanceof NsidError
}
