import { readFile } from "node:fs/promises"
import { NotFoundError, ValidationError } from "@/lib/errors"
import { findSampleContract, SAMPLE_CONTRACTS } from "@/lib/sample-contracts"

export interface ContractInput {
  text: string
  /** File path, `sample:<id>` or `stdin` */
  source: string
}

/** The subset of a process stdin stream the reader needs */
export interface InputStream extends AsyncIterable<string | Buffer> {
  isTTY?: boolean
}

async function readStream(stream: InputStream): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk)
  }
  return Buffer.concat(chunks).toString("utf-8")
}

/**
 * Resolve contract text from a file, a built-in sample, or piped stdin.
 *
 * @throws {NotFoundError} for a missing file or unknown sample id
 * @throws {ValidationError} when nothing is piped to an interactive terminal
 */
export async function readContractInput(
  options: { file?: string; sample?: string },
  stdin: InputStream
): Promise<ContractInput> {
  if (options.sample !== undefined) {
    const sample = findSampleContract(options.sample)
    if (!sample) {
      const known = SAMPLE_CONTRACTS.map((s) => s.id).join(", ")
      throw new NotFoundError(`Unknown sample "${options.sample}". Available samples: ${known}`)
    }
    return { text: sample.rawText, source: `sample:${sample.id}` }
  }

  if (options.file !== undefined) {
    try {
      return { text: await readFile(options.file, "utf-8"), source: options.file }
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new NotFoundError(`Contract file not found: ${options.file}`)
      }
      throw error
    }
  }

  if (stdin.isTTY) {
    throw new ValidationError("No contract provided", [
      { field: "file", message: "Pass a file, --sample <id>, or pipe text on stdin" },
    ])
  }

  return { text: await readStream(stdin), source: "stdin" }
}
