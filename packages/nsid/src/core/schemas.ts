import { z } from "zod"
import type { ParseResult } from "../ports/parse-result"
import { Fragment } from "./fragment"
import { FullReference } from "./full-reference"
import { Nsid } from "./nsid"
import { type Reference, safeParseReference } from "./reference"

function fromSafeParse<T>(safeParse: (text: string) => ParseResult<T>) {
  return z.string().transform((text, ctx) => {
    const result = safeParse(text)

    if (result.ok) return result.value

    ctx.issues.push({
      code: "custom",
      message: result.error.message,
      input: text,
      params: { code: result.error.code, reason: result.error.reason },
    })

    return z.NEVER
  })
}

/**
 * zod schemas that accept identifier text and output parsed values.
 *
 * @example
 * ```ts
 * const Lexicon = z.object({ id: nsidSchema, main: referenceSchema })
 *
 * Lexicon.parse({ id: "com.example.fooBar", main: "#main" })
 * ```
 */
export const nsidSchema = fromSafeParse<Nsid>((text) => Nsid.safeParse(text))

export const fragmentSchema = fromSafeParse<Fragment>((text) => Fragment.safeParse(text))

export const fullReferenceSchema = fromSafeParse<FullReference>((text) =>
  FullReference.safeParse(text),
)

export const referenceSchema = fromSafeParse<Reference>((text) => safeParseReference(text))
