import { type FullReference, type Reference, safeParseReference } from "@lexid/nsid"
import type { Logger } from "pino"

export type ExplainIo = {
  write: (line: string) => void
  logger: Logger
}

const row = (label: string, value: string) => `${`${label}:`.padEnd(11)}${value}`

function describeFull(ref: FullReference): string[] {
  const nsid = ref.cloneNsid()

  return [
    row("nsid", nsid.asString()),
    row("authority", nsid.authority),
    row("name", nsid.name),
    row("segments", [...nsid.segments()].join(", ")),
    row("fragment", ref.cloneFragment()?.asString() ?? "-"),
  ]
}

export function describeReference(ref: Reference): string[] {
  switch (ref.kind) {
    case "full":
      return [row("kind", "full"), ...describeFull(ref.value)]
    case "relative":
      return [row("kind", "relative"), row("fragment", ref.value.asString())]
  }
}

/**
 * Print the parts of a reference.
 *
 * @returns process exit code: 0 if the input parsed, 1 otherwise
 */
export function runExplain(input: string, io: ExplainIo): number {
  const result = safeParseReference(input)

  if (!result.ok) {
    io.logger.debug({ err: result.error }, "rejected input")
    io.write(result.error.message)
    return 1
  }

  for (const line of describeReference(result.value)) io.write(line)

  return 0
}
