/**
 * Inclusive bounds on the length of a single identifier segment.
 */
export type SegmentLengthRange = Readonly<{
  min: number
  max: number
}>

/**
 * Classifies the individual dot-separated segments of an NSID.
 *
 * The engine decides *which* predicate applies to a segment from its position;
 * the grammar only answers whether a segment is well formed in that position.
 *
 * @remarks
 * Implementations must be pure, must reject the empty string, and must reject
 * any non-ASCII code unit.
 */
export interface SegmentGrammar {
  /**
   * Length bounds shared by every segment kind.
   * Also bounds the name part of a fragment (`#name`).
   */
  readonly segmentLength: SegmentLengthRange

  /** First (leftmost) segment, e.g. `com` in `com.example.fooBar` */
  isValidTld(segment: string): boolean

  /** Any segment that is neither the first nor the last */
  isValidDomainSegment(segment: string): boolean

  /** Final (rightmost) segment, e.g. `fooBar` in `com.example.fooBar` */
  isValidName(segment: string): boolean
}
