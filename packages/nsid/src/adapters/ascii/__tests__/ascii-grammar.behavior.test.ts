import {
  asciiGrammar,
  isValidDomainSegment,
  isValidName,
  isValidTld,
  SEGMENT_LENGTH,
} from "../ascii-grammar"

describe("asciiGrammar (behavior)", () => {
  it("allows segments of 1 to 63 characters", () => {
    expect(SEGMENT_LENGTH).toEqual({ min: 1, max: 63 })
    expect(asciiGrammar.segmentLength).toBe(SEGMENT_LENGTH)
  })

  describe("isValidDomainSegment", () => {
    it.each(["example", "a", "a-0", "b-1", "8", "x".repeat(63), "Mixed-Case-9"])(
      "accepts %s",
      (segment) => {
        expect(isValidDomainSegment(segment)).toBe(true)
      },
    )

    it.each(["-leading", "trailing-", "-", "under_score", "dot.ted", "sp ace", "x".repeat(64)])(
      "rejects %s",
      (segment) => {
        expect(isValidDomainSegment(segment)).toBe(false)
      },
    )
  })

  describe("isValidTld", () => {
    it("accepts letters, digits and inner hyphens", () => {
      expect(isValidTld("com")).toBe(true)
      expect(isValidTld("a-0")).toBe(true)
      expect(isValidTld("cn")).toBe(true)
    })

    it("rejects a leading digit", () => {
      expect(isValidTld("8")).toBe(false)
      expect(isValidTld("1com")).toBe(false)
    })

    it("rejects what a domain segment rejects", () => {
      expect(isValidTld("-com")).toBe(false)
      expect(isValidTld("com-")).toBe(false)
    })
  })

  describe("isValidName", () => {
    it.each(["fooBar", "c", "ping", "getRecord2", "X".repeat(63)])("accepts %s", (segment) => {
      expect(isValidName(segment)).toBe(true)
    })

    it.each(["1foo", "foo-bar", "foo_bar", "-", "X".repeat(64)])("rejects %s", (segment) => {
      expect(isValidName(segment)).toBe(false)
    })
  })

  it("is frozen", () => {
    expect(Object.isFrozen(asciiGrammar)).toBe(true)
  })
})
