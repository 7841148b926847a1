import { Command, Option } from "commander"
import type { Logger } from "pino"
import { checkKinds, isCheckKind, runCheck, splitInputLines } from "./commands/check"
import { runExplain } from "./commands/explain"

export type ProgramDeps = {
  /** Writes one line of command output */
  write: (line: string) => void
  logger: Logger
  /** Reads all of stdin; used by `check` when no inputs are given */
  readStdin: () => Promise<string>
  setExitCode: (code: number) => void
}

export const VERSION = "0.1.0"

export function createProgram(deps: ProgramDeps): Command {
  const program = new Command()

  program
    .name("lexid")
    .description("Validate and inspect namespaced identifiers (NSIDs) and references")
    .version(VERSION)

  program
    .command("check")
    .description("validate identifiers given as arguments, or one per line on stdin")
    .argument("[inputs...]", "identifiers to validate")
    .addOption(
      new Option("-k, --kind <kind>", "what each input must be")
        .choices(checkKinds)
        .default("reference"),
    )
    .option("--json", "print one JSON object per input", false)
    .action(async (inputs: string[], opts: { kind: string; json: boolean }) => {
      if (!isCheckKind(opts.kind)) {
        throw new Error(`Unknown kind: ${opts.kind}`)
      }

      const lines = inputs.length > 0 ? inputs : splitInputLines(await deps.readStdin())
      const logger = deps.logger.child({ command: "check" })

      deps.setExitCode(
        runCheck(lines, { kind: opts.kind, json: opts.json }, { write: deps.write, logger }),
      )
    })

  program
    .command("explain")
    .description("show the parts of a reference")
    .argument("<input>", "reference to explain")
    .action((input: string) => {
      const logger = deps.logger.child({ command: "explain" })

      deps.setExitCode(runExplain(input, { write: deps.write, logger }))
    })

  return program
}
