import type { ContractAnalysis } from "@/lib/contract-analysis"

export const NOT_DETECTED = "Not detected"
export const NOT_APPLICABLE = "Not applicable"

/** Join extracted entities for display, or "Not detected" when there are none */
export function formatEntityList(values: readonly string[]): string {
  return values.length > 0 ? values.join(", ") : NOT_DETECTED
}

/**
 * Composite score as plain decimal text ("1.25", whole numbers as "2.0"), or
 * "Not applicable" for a clause-less document
 */
export function formatCompositeScore(score: ContractAnalysis["compositeRiskScore"]): string {
  if (score === null) return NOT_APPLICABLE
  return Number.isInteger(score) ? score.toFixed(1) : String(score)
}
