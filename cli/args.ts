import { parseArgs } from "node:util"
import { ValidationError } from "@/lib/errors"
import { Err, Ok, type Result } from "@/lib/result"
import { REPORT_FILE_NAME } from "@/lib/report"

export type CliCommand =
  | {
      command: "analyze"
      /** Contract text file; stdin is read when neither file nor sample is given */
      file?: string
      sample?: string
      /** Overrides CONTRACT_REPORT_DIR */
      outDir?: string
      json: boolean
    }
  | { command: "audit-log" }
  | { command: "help" }

export const USAGE = `Usage:
  contract-risk analyze [file] [--sample <id>] [--out <dir>] [--json]
  contract-risk audit-log
  contract-risk help

Commands:
  analyze     Segment, classify and risk-score a contract, then write ${REPORT_FILE_NAME}
  audit-log   Print every recorded audit entry`

function parseAnalyze(argv: string[]): Result<CliCommand, ValidationError> {
  let values: { sample?: string; out?: string; json?: boolean }
  let positionals: string[]
  try {
    ;({ values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        sample: { type: "string", short: "s" },
        out: { type: "string", short: "o" },
        json: { type: "boolean", default: false },
      },
    }))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return Err(new ValidationError("Invalid arguments", [{ message }]))
  }

  if (positionals.length > 1) {
    return Err(
      new ValidationError("Invalid arguments", [
        { field: "file", message: "Only one contract file can be analyzed at a time" },
      ])
    )
  }

  const [file] = positionals
  if (file !== undefined && values.sample !== undefined) {
    return Err(
      new ValidationError("Invalid arguments", [
        { field: "sample", message: "Pass either a file or --sample, not both" },
      ])
    )
  }

  return Ok({
    command: "analyze",
    file,
    sample: values.sample,
    outDir: values.out,
    json: values.json ?? false,
  })
}

/**
 * Parse CLI arguments (without the node and script entries).
 */
export function parseCliArgs(argv: string[]): Result<CliCommand, ValidationError> {
  const [command, ...rest] = argv

  switch (command) {
    case "analyze":
      return parseAnalyze(rest)
    case "audit-log":
      if (rest.length > 0) {
        return Err(
          new ValidationError("Invalid arguments", [
            { message: `audit-log takes no arguments, got: ${rest.join(" ")}` },
          ])
        )
      }
      return Ok({ command: "audit-log" })
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return Ok({ command: "help" })
    default:
      return Err(
        new ValidationError("Unknown command", [{ field: "command", message: `Unknown command: ${command}` }])
      )
  }
}
