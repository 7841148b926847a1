export {
  asciiGrammar,
  isValidDomainSegment,
  isValidName,
  isValidTld,
  SEGMENT_LENGTH,
} from "./adapters/ascii/ascii-grammar"
export {
  type FragmentFormatReason,
  isNsidError,
  NsidError,
  type NsidErrorCode,
  type NsidErrorContext,
  type NsidErrorReason,
  type NsidFormatReason,
  type SerializedNsidError,
} from "./core/errors"
export { Fragment } from "./core/fragment"
export { FullReference } from "./core/full-reference"
export { Nsid } from "./core/nsid"
export {
  type FullReferenceVariant,
  formatReference,
  parseReference,
  type Reference,
  type ReferenceKind,
  type RelativeReferenceVariant,
  resolveReference,
  safeParseReference,
} from "./core/reference"
export {
  fragmentSchema,
  fullReferenceSchema,
  nsidSchema,
  referenceSchema,
} from "./core/schemas"
export { SegmentSequence } from "./core/segments"
export {
  NSID_MAX_AUTHORITY_LENGTH,
  NSID_MAX_LENGTH,
  NSID_MIN_SEGMENTS,
  validateFragment,
  validateNsid,
} from "./core/validate"
export type {
  ParseFailure,
  ParseOptions,
  ParseResult,
  ParseSuccess,
} from "./ports/parse-result"
export type { SegmentGrammar, SegmentLengthRange } from "./ports/segment-grammar"
