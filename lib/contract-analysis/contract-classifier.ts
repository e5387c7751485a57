import { RULES, firstMatchingRule } from "./rules"
import { DEFAULT_CONTRACT_TYPE, type ContractType } from "./types"

/**
 * Assign one coarse contract type to a whole document.
 *
 * Rule groups are tested in declaration order and the first group with any
 * keyword hit wins, so a lease that mentions its employees is classified as
 * an Employment Agreement.
 */
export function classifyContract(text: string): ContractType {
  return firstMatchingRule(RULES.contractTypes, text.toLowerCase()) ?? DEFAULT_CONTRACT_TYPE
}
