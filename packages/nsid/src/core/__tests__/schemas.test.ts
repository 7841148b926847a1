import { z } from "zod"
import { Fragment } from "../fragment"
import { FullReference } from "../full-reference"
import { Nsid } from "../nsid"
import { fragmentSchema, fullReferenceSchema, nsidSchema, referenceSchema } from "../schemas"

describe("schemas", () => {
  it("nsidSchema outputs an Nsid", () => {
    const result = nsidSchema.safeParse("com.example.fooBar")

    expect(result.success).toBe(true)
    expect(result.data).toBeInstanceOf(Nsid)
    expect(String(result.data)).toBe("com.example.fooBar")
  })

  it("fragmentSchema outputs a Fragment", () => {
    expect(fragmentSchema.parse("#main")).toBeInstanceOf(Fragment)
  })

  it("fullReferenceSchema outputs a FullReference", () => {
    const ref = fullReferenceSchema.parse("com.example.foo#bar")

    expect(ref).toBeInstanceOf(FullReference)
    expect(ref.fragmentName()).toBe("bar")
  })

  it("referenceSchema dispatches on the leading character", () => {
    expect(referenceSchema.parse("#main").kind).toBe("relative")
    expect(referenceSchema.parse("a.b.c").kind).toBe("full")
  })

  it("reports the parse error as a custom issue", () => {
    const result = nsidSchema.safeParse("com.example")

    expect(result.success).toBe(false)
    expect(result.error?.issues).toHaveLength(1)
    expect(result.error?.issues[0]).toMatchObject({
      code: "custom",
      message: 'Invalid NSID "com.example": identifier needs at least 3 segments',
      params: { code: "nsid_format", reason: "too_few_segments" },
    })
  })

  it("rejects non-strings", () => {
    expect(nsidSchema.safeParse(42).success).toBe(false)
  })

  it("composes into larger schemas", () => {
    const Lexicon = z.object({ id: nsidSchema, main: referenceSchema })

    const parsed = Lexicon.parse({ id: "com.example.fooBar", main: "#main" })

    expect(parsed.id.name).toBe("fooBar")
    expect(parsed.main.kind).toBe("relative")
    expect(() => Lexicon.parse({ id: "com.example.fooBar", main: "#ma in" })).toThrow()
  })
})
