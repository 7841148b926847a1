import type { ParseOptions, ParseResult } from "../ports/parse-result"
import { isNsidError, nsidFormatError } from "./errors"
import { SegmentSequence } from "./segments"
import { fromTrusted } from "./trusted"
import { validateNsid } from "./validate"

const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })
const lossyDecoder = new TextDecoder("utf-8", { ignoreBOM: true })

/**
 * A validated Namespaced Identifier, e.g. `com.example.fooBar`.
 *
 * The text is stored exactly as given: no case folding, no normalization.
 * Instances are immutable and can only be obtained through validation.
 */
export class Nsid {
  private constructor(private readonly text: string) {
    Object.freeze(this)
  }

  /**
   * @throws {NsidError} `nsid_format` if `text` is not a valid NSID
   */
  static parse(text: string, options?: ParseOptions): Nsid {
    const reason = validateNsid(text, options?.grammar)

    if (reason !== undefined) throw nsidFormatError(text, reason)

    return new Nsid(text)
  }

  /**
   * Parse raw UTF-8 bytes.
   *
   * @throws {NsidError} `nsid_format` if the bytes are not UTF-8 or not a valid NSID
   */
  static fromBytes(bytes: Uint8Array, options?: ParseOptions): Nsid {
    let text: string

    try {
      text = strictDecoder.decode(bytes)
    } catch (err) {
      throw nsidFormatError(lossyDecoder.decode(bytes), "invalid_utf8", err)
    }

    return Nsid.parse(text, options)
  }

  static safeParse(text: string, options?: ParseOptions): ParseResult<Nsid> {
    try {
      return { ok: true, value: Nsid.parse(text, options) }
    } catch (err) {
      if (isNsidError(err)) return { ok: false, error: err }
      throw err
    }
  }

  static isValid(text: string, options?: ParseOptions): boolean {
    return validateNsid(text, options?.grammar) === undefined
  }

  static is(value: unknown): value is Nsid {
    return value instanceof Nsid
  }

  /** @internal */
  static [fromTrusted](text: string): Nsid {
    return new Nsid(text)
  }

  static compare(a: Nsid, b: Nsid): number {
    if (a.text === b.text) return 0

    return a.text < b.text ? -1 : 1
  }

  /** Dot-separated segments, first to last; `.reverse()` for last to first */
  segments(): SegmentSequence {
    return new SegmentSequence(this.text)
  }

  /** Every segment but the last, e.g. `com.example` */
  get authority(): string {
    return this.text.slice(0, this.text.lastIndexOf("."))
  }

  /** Last segment, e.g. `fooBar` */
  get name(): string {
    return this.segments().last()
  }

  get length(): number {
    return this.text.length
  }

  equals(other: Nsid): boolean {
    return this.text === other.text
  }

  asString(): string {
    return this.text
  }

  toString(): string {
    return this.text
  }

  toJSON(): string {
    return this.text
  }
}
