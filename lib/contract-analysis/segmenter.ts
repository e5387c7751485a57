import type { Clause } from "./types"

/** A fragment must be strictly longer than this, after trimming, to count as a clause */
export const MIN_CLAUSE_LENGTH = 30

/** Newline, or a period followed by whitespace. The separator is dropped. */
const CLAUSE_BOUNDARY = /\n|\.\s+/

/**
 * Split raw contract text into clauses.
 *
 * Length is measured in code points so Devanagari text and symbols such as
 * `₹` count one per character.
 */
export function segmentClauses(text: string): Clause[] {
  return text
    .split(CLAUSE_BOUNDARY)
    .map((fragment) => fragment.trim())
    .filter((fragment) => Array.from(fragment).length > MIN_CLAUSE_LENGTH)
    .map((fragment, i) => ({ ordinal: i + 1, text: fragment }))
}
