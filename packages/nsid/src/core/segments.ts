const SEPARATOR = "."

/**
 * Lazily split `text` on `.` from the left.
 *
 * Mirrors `String.prototype.split`: the empty string yields one empty segment,
 * and leading, trailing or doubled dots yield empty segments.
 */
export function* splitSegments(text: string): Generator<string, void, undefined> {
  let start = 0

  for (;;) {
    const dot = text.indexOf(SEPARATOR, start)

    if (dot === -1) {
      yield text.slice(start)
      return
    }

    yield text.slice(start, dot)
    start = dot + 1
  }
}

/**
 * Lazily split `text` on `.` from the right.
 * Yields exactly the segments of {@link splitSegments}, last first.
 */
export function* splitSegmentsReverse(text: string): Generator<string, void, undefined> {
  let end = text.length

  for (;;) {
    const dot = end === 0 ? -1 : text.lastIndexOf(SEPARATOR, end - 1)

    if (dot === -1) {
      yield text.slice(0, end)
      return
    }

    yield text.slice(dot + 1, end)
    end = dot
  }
}

/**
 * Restartable view over the segments of an identifier.
 *
 * Nothing is materialized: every iteration re-scans the text.
 *
 * @example
 * ```ts
 * const segments = Nsid.parse("com.example.fooBar").segments()
 *
 * [...segments]           // ["com", "example", "fooBar"]
 * [...segments.reverse()] // ["fooBar", "example", "com"]
 * ```
 */
export class SegmentSequence implements Iterable<string> {
  constructor(private readonly text: string) {}

  [Symbol.iterator](): Iterator<string> {
    return splitSegments(this.text)
  }

  reverse(): Iterable<string> {
    const text = this.text

    return {
      [Symbol.iterator]: () => splitSegmentsReverse(text),
    }
  }

  last(): string {
    return this.text.slice(this.text.lastIndexOf(SEPARATOR) + 1)
  }
}
