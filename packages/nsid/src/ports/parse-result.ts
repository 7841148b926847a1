import type { NsidError } from "../core/errors"
import type { SegmentGrammar } from "./segment-grammar"

export type ParseSuccess<T> = {
  readonly ok: true
  readonly value: T
}

export type ParseFailure = {
  readonly ok: false
  readonly error: NsidError
}

/**
 * Result of a non-throwing parse.
 *
 * @remarks
 * Validation is all-or-nothing: a failure never carries a partially parsed value.
 */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure

export type ParseOptions = Readonly<{
  /**
   * Segment grammar used to classify each segment.
   * @default asciiGrammar
   */
  grammar?: SegmentGrammar
}>
