import type { ParseOptions, ParseResult } from "../ports/parse-result"
import { isNsidError } from "./errors"
import { Fragment } from "./fragment"
import { FullReference } from "./full-reference"
import type { Nsid } from "./nsid"
import { fromTrusted } from "./trusted"

export type FullReferenceVariant = {
  readonly kind: "full"
  readonly value: FullReference
}

export type RelativeReferenceVariant = {
  readonly kind: "relative"
  readonly value: Fragment
}

/**
 * Reference to a schema definition, as written inside a schema document.
 *
 * - `relative`: a bare `#name`, resolved against the containing document
 * - `full`: an NSID with an optional fragment
 */
export type Reference = FullReferenceVariant | RelativeReferenceVariant

export type ReferenceKind = Reference["kind"]

/**
 * Parse a reference; the leading character decides the variant.
 *
 * @throws {NsidError} `nsid_fragment_format` for a malformed `#name`,
 * otherwise whatever {@link FullReference.parse} throws
 *
 * @example
 * ```ts
 * parseReference("#main")             // { kind: "relative", value: Fragment }
 * parseReference("com.example.foo#x") // { kind: "full", value: FullReference }
 * ```
 */
export function parseReference(text: string, options?: ParseOptions): Reference {
  if (text.startsWith("#")) {
    return { kind: "relative", value: Fragment.parse(text, options) }
  }

  return { kind: "full", value: FullReference.parse(text, options) }
}

export function safeParseReference(
  text: string,
  options?: ParseOptions,
): ParseResult<Reference> {
  try {
    return { ok: true, value: parseReference(text, options) }
  } catch (err) {
    if (isNsidError(err)) return { ok: false, error: err }
    throw err
  }
}

/**
 * Render a reference exactly as it was parsed.
 */
export function formatReference(ref: Reference): string {
  switch (ref.kind) {
    case "full":
      return ref.value.asString()
    case "relative":
      return ref.value.asString()
  }
}

/**
 * Qualify a relative reference with the NSID of the document containing it.
 * Full references are returned as they are.
 */
export function resolveReference(ref: Reference, base: Nsid): FullReference {
  switch (ref.kind) {
    case "full":
      return ref.value
    case "relative":
      return FullReference[fromTrusted](base, ref.value)
  }
}
