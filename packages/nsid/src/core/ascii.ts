const UPPER_A = 0x41
const UPPER_Z = 0x5a
const LOWER_A = 0x61
const LOWER_Z = 0x7a
const DIGIT_0 = 0x30
const DIGIT_9 = 0x39

export const HYPHEN = 0x2d

export function isAsciiLetter(code: number): boolean {
  return (code >= UPPER_A && code <= UPPER_Z) || (code >= LOWER_A && code <= LOWER_Z)
}

export function isAsciiDigit(code: number): boolean {
  return code >= DIGIT_0 && code <= DIGIT_9
}

export function isAsciiAlphanumeric(code: number): boolean {
  return isAsciiLetter(code) || isAsciiDigit(code)
}

/**
 * `true` if every code unit of `text` from `start` on passes `predicate`.
 * Code units above 0x7f never pass the ASCII predicates above.
 */
export function everyCode(
  text: string,
  predicate: (code: number) => boolean,
  start: number = 0,
): boolean {
  for (let i = start; i < text.length; i++) {
    if (!predicate(text.charCodeAt(i))) return false
  }

  return true
}

const encoder = new TextEncoder()

/**
 * UTF-8 byte length (not UTF-16 code units).
 */
export function utf8ByteLength(text: string): number {
  return encoder.encode(text).length
}
