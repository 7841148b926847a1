import { asciiGrammar } from "../adapters/ascii/ascii-grammar"
import type { SegmentGrammar } from "../ports/segment-grammar"
import { everyCode, isAsciiAlphanumeric, utf8ByteLength } from "./ascii"
import type { FragmentFormatReason, NsidFormatReason } from "./errors"
import { splitSegments } from "./segments"

/** Maximum NSID length in bytes */
export const NSID_MAX_LENGTH = 317

/**
 * Bound on the authority (every segment but the name, dots included).
 * The authority must be strictly shorter than this.
 */
export const NSID_MAX_AUTHORITY_LENGTH = 253

export const NSID_MIN_SEGMENTS = 3

const FRAGMENT_PREFIX = "#"

/**
 * Validate NSID text in a single left-to-right pass.
 *
 * Looks one segment ahead to tell whether the current segment is the last
 * one: the last segment is checked against the name predicate and the
 * authority bound, all others after the first against the domain predicate.
 *
 * @returns `undefined` if valid, otherwise why not
 */
export function validateNsid(
  text: string,
  grammar: SegmentGrammar = asciiGrammar,
): NsidFormatReason | undefined {
  if (text.length > NSID_MAX_LENGTH || utf8ByteLength(text) > NSID_MAX_LENGTH) {
    return "too_long"
  }

  if (text.length === 0) return "empty"

  const segments = splitSegments(text)

  let current = segments.next()
  if (current.done) return "empty"

  if (!grammar.isValidTld(current.value)) return "invalid_tld"

  let authorityLength = current.value.length
  let count = 1

  current = segments.next()

  while (!current.done) {
    const segment = current.value
    const next = segments.next()

    if (next.done) {
      if (authorityLength >= NSID_MAX_AUTHORITY_LENGTH) return "authority_too_long"
      if (!grammar.isValidName(segment)) return "invalid_name"
    } else if (!grammar.isValidDomainSegment(segment)) {
      return "invalid_domain_segment"
    }

    count++
    authorityLength += 1 + segment.length
    current = next
  }

  if (count < NSID_MIN_SEGMENTS) return "too_few_segments"

  return undefined
}

/**
 * Validate `#name` fragment text.
 *
 * @returns `undefined` if valid, otherwise why not
 */
export function validateFragment(
  text: string,
  grammar: SegmentGrammar = asciiGrammar,
): FragmentFormatReason | undefined {
  if (!text.startsWith(FRAGMENT_PREFIX)) return "missing_hash"

  const nameLength = text.length - FRAGMENT_PREFIX.length
  const { min, max } = grammar.segmentLength

  if (nameLength < min || nameLength > max) return "invalid_length"

  if (!everyCode(text, isAsciiAlphanumeric, FRAGMENT_PREFIX.length)) {
    return "invalid_character"
  }

  return undefined
}
