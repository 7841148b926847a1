import { captureLogger } from "../../__tests__/capture"
import { checkInput, formatOutcome, isCheckKind, runCheck, splitInputLines } from "../check"

describe("checkInput", () => {
  it("reports the variant of a reference", () => {
    expect(checkInput("com.example.foo", "reference")).toEqual({
      input: "com.example.foo",
      valid: true,
      kind: "full",
    })
    expect(checkInput("#abc", "reference")).toEqual({ input: "#abc", valid: true, kind: "relative" })
  })

  it("checks against the requested kind", () => {
    expect(checkInput("com.example.foo#bar", "full")).toEqual({
      input: "com.example.foo#bar",
      valid: true,
      kind: "full",
    })
    expect(checkInput("#abc", "nsid")).toEqual({
      input: "#abc",
      valid: false,
      code: "nsid_format",
      reason: "invalid_tld",
    })
    expect(checkInput("main", "fragment")).toEqual({
      input: "main",
      valid: false,
      code: "nsid_fragment_format",
      reason: "missing_hash",
    })
    expect(checkInput("com.example.foo#bar", "nsid")).toMatchObject({ valid: false })
  })
})

describe("formatOutcome", () => {
  it("formats text lines", () => {
    expect(formatOutcome(checkInput("a.b.c", "nsid"), false)).toBe("ok      a.b.c")
    expect(formatOutcome(checkInput("com.example", "nsid"), false)).toBe(
      "invalid com.example (nsid_format: too_few_segments)",
    )
  })

  it("formats JSON lines", () => {
    expect(formatOutcome(checkInput("a.b.c", "reference"), true)).toBe(
      '{"input":"a.b.c","valid":true,"kind":"full"}',
    )
    expect(formatOutcome(checkInput("com.example", "nsid"), true)).toBe(
      '{"input":"com.example","valid":false,"code":"nsid_format","reason":"too_few_segments"}',
    )
  })
})

describe("runCheck", () => {
  it("returns 0 when every input is valid", () => {
    const lines: string[] = []
    const { logger } = captureLogger("silent")

    const code = runCheck(["a.b.c", "#main"], { kind: "reference", json: false }, {
      write: (line) => lines.push(line),
      logger,
    })

    expect(code).toBe(0)
    expect(lines).toEqual(["ok      a.b.c", "ok      #main"])
  })

  it("returns 1 and logs rejected inputs", () => {
    const lines: string[] = []
    const { logger, entries } = captureLogger("debug")

    const code = runCheck(["a.b.c", "com.example"], { kind: "nsid", json: false }, {
      write: (line) => lines.push(line),
      logger,
    })

    expect(code).toBe(1)
    expect(lines).toEqual(["ok      a.b.c", "invalid com.example (nsid_format: too_few_segments)"])
    expect(entries()).toEqual([
      expect.objectContaining({
        level: 20,
        msg: "rejected input",
        input: "com.example",
        code: "nsid_format",
        reason: "too_few_segments",
      }),
      expect.objectContaining({
        level: 30,
        msg: "check complete",
        kind: "nsid",
        total: 2,
        invalid: 1,
      }),
    ])
  })
})

describe("splitInputLines", () => {
  it("keeps non-empty trimmed lines", () => {
    expect(splitInputLines("a.b.c\r\n\n  #x  \n")).toEqual(["a.b.c", "#x"])
    expect(splitInputLines("")).toEqual([])
  })
})

describe("isCheckKind", () => {
  it("accepts the known kinds", () => {
    expect(isCheckKind("nsid")).toBe(true)
    expect(isCheckKind("reference")).toBe(true)
    expect(isCheckKind("uri")).toBe(false)
  })
})
