import type { ParseOptions, ParseResult } from "../ports/parse-result"
import { fragmentFormatError, isNsidError, nsidFormatError } from "./errors"
import { Fragment } from "./fragment"
import { Nsid } from "./nsid"
import { fromTrusted } from "./trusted"
import { validateFragment, validateNsid } from "./validate"

/**
 * A fully-qualified NSID reference: an NSID and an optional fragment,
 * e.g. `com.example.foo` or `com.example.foo#bar`.
 *
 * Stored as the original text plus the offset where the fragment starts.
 * `fragmentStart === text.length` means there is no fragment; otherwise the
 * fragment runs from its `#` to the end of the text.
 */
export class FullReference {
  private constructor(
    private readonly text: string,
    private readonly fragmentStart: number,
  ) {
    Object.freeze(this)
  }

  /**
   * Split at the first `#` and validate both sides.
   *
   * @throws {NsidError} `nsid_format` if the NSID part is malformed,
   * `nsid_fragment_format` if a fragment part is present and malformed
   */
  static parse(text: string, options?: ParseOptions): FullReference {
    const hash = text.indexOf("#")
    const fragmentStart = hash === -1 ? text.length : hash

    const nsidReason = validateNsid(text.slice(0, fragmentStart), options?.grammar)
    if (nsidReason !== undefined) throw nsidFormatError(text, nsidReason)

    if (fragmentStart < text.length) {
      const fragmentReason = validateFragment(text.slice(fragmentStart), options?.grammar)
      if (fragmentReason !== undefined) throw fragmentFormatError(text, fragmentReason)
    }

    return new FullReference(text, fragmentStart)
  }

  static safeParse(text: string, options?: ParseOptions): ParseResult<FullReference> {
    try {
      return { ok: true, value: FullReference.parse(text, options) }
    } catch (err) {
      if (isNsidError(err)) return { ok: false, error: err }
      throw err
    }
  }

  static is(value: unknown): value is FullReference {
    return value instanceof FullReference
  }

  /** Reference to the whole document named by `nsid` (no fragment). */
  static fromNsid(nsid: Nsid): FullReference {
    return new FullReference(nsid.asString(), nsid.length)
  }

  /**
   * Join a validated NSID and fragment.
   * @internal
   */
  static [fromTrusted](nsid: Nsid, fragment: Fragment): FullReference {
    return new FullReference(`${nsid.asString()}${fragment.asString()}`, nsid.length)
  }

  static compare(a: FullReference, b: FullReference): number {
    if (a.text === b.text) return 0

    return a.text < b.text ? -1 : 1
  }

  cloneNsid(): Nsid {
    return Nsid[fromTrusted](this.text.slice(0, this.fragmentStart))
  }

  hasFragment(): boolean {
    return this.fragmentStart < this.text.length
  }

  /** The fragment with its leading `#`, if any */
  cloneFragment(): Fragment | undefined {
    if (!this.hasFragment()) return undefined

    return Fragment[fromTrusted](this.text.slice(this.fragmentStart))
  }

  /** The fragment name without its `#`, if any */
  fragmentName(): string | undefined {
    if (!this.hasFragment()) return undefined

    return this.text.slice(this.fragmentStart + 1)
  }

  equals(other: FullReference): boolean {
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
