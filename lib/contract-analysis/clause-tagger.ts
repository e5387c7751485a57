import { RULES, firstMatchingRule } from "./rules"
import type { ClauseType } from "./types"

/**
 * Tag a clause with its modality.
 *
 * Prohibition is checked before Obligation because "shall not" also contains
 * "shall"; Right comes last.
 */
export function tagClause(text: string): ClauseType {
  return firstMatchingRule(RULES.clauseTypes, text.toLowerCase()) ?? "Neutral"
}
