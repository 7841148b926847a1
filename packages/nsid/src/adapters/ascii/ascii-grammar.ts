import {
  everyCode,
  HYPHEN,
  isAsciiAlphanumeric,
  isAsciiDigit,
  isAsciiLetter,
} from "../../core/ascii"
import type { SegmentGrammar, SegmentLengthRange } from "../../ports/segment-grammar"

export const SEGMENT_LENGTH: SegmentLengthRange = Object.freeze({ min: 1, max: 63 })

const isDomainCode = (code: number) => isAsciiAlphanumeric(code) || code === HYPHEN

function inSegmentRange(segment: string): boolean {
  return segment.length >= SEGMENT_LENGTH.min && segment.length <= SEGMENT_LENGTH.max
}

/**
 * Letters, digits and hyphens; no leading or trailing hyphen.
 * May start with a digit (`cn.8.lex.stuff`).
 */
export function isValidDomainSegment(segment: string): boolean {
  if (!inSegmentRange(segment)) return false

  if (segment.charCodeAt(0) === HYPHEN) return false
  if (segment.charCodeAt(segment.length - 1) === HYPHEN) return false

  return everyCode(segment, isDomainCode)
}

/**
 * A domain segment that does not start with a digit.
 */
export function isValidTld(segment: string): boolean {
  return isValidDomainSegment(segment) && !isAsciiDigit(segment.charCodeAt(0))
}

/**
 * Starts with a letter, then letters and digits only.
 */
export function isValidName(segment: string): boolean {
  if (!inSegmentRange(segment)) return false

  return isAsciiLetter(segment.charCodeAt(0)) && everyCode(segment, isAsciiAlphanumeric, 1)
}

/**
 * Default grammar: ASCII-only NSID segments, 1 to 63 characters each.
 */
export const asciiGrammar: SegmentGrammar = Object.freeze({
  segmentLength: SEGMENT_LENGTH,
  isValidTld,
  isValidDomainSegment,
  isValidName,
})
