import type { ParseOptions, ParseResult } from "../ports/parse-result"
import { fragmentFormatError, isNsidError } from "./errors"
import { fromTrusted } from "./trusted"
import { validateFragment } from "./validate"

/**
 * A validated `#name` fragment naming a definition inside a schema document.
 *
 * The stored text keeps its leading `#`.
 */
export class Fragment {
  private constructor(private readonly text: string) {
    Object.freeze(this)
  }

  /**
   * @throws {NsidError} `nsid_fragment_format` if `text` is not `#` followed by a valid name
   */
  static parse(text: string, options?: ParseOptions): Fragment {
    const reason = validateFragment(text, options?.grammar)

    if (reason !== undefined) throw fragmentFormatError(text, reason)

    return new Fragment(text)
  }

  static safeParse(text: string, options?: ParseOptions): ParseResult<Fragment> {
    try {
      return { ok: true, value: Fragment.parse(text, options) }
    } catch (err) {
      if (isNsidError(err)) return { ok: false, error: err }
      throw err
    }
  }

  static isValid(text: string, options?: ParseOptions): boolean {
    return validateFragment(text, options?.grammar) === undefined
  }

  static is(value: unknown): value is Fragment {
    return value instanceof Fragment
  }

  /** @internal */
  static [fromTrusted](text: string): Fragment {
    return new Fragment(text)
  }

  static compare(a: Fragment, b: Fragment): number {
    if (a.text === b.text) return 0

    return a.text < b.text ? -1 : 1
  }

  /** Name without the leading `#` */
  get name(): string {
    return this.text.slice(1)
  }

  equals(other: Fragment): boolean {
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
