import type { RiskCategory } from "./types"

export const NO_RISK_EXPLANATION =
  "This clause appears balanced and does not pose significant legal risk."

export const RISK_EXPLANATION_PREFIX =
  "This clause may expose the business to legal risk due to: "

export const NO_MITIGATION = "No immediate mitigation required."

export const RENEGOTIATE_MITIGATION =
  "Consider renegotiating this clause to ensure mutual obligations, " +
  "clear limits on liability, and fair termination conditions."

/** Plain-language explanation listing the detected risks in detection order */
export function explainRisks(risks: readonly RiskCategory[]): string {
  if (risks.length === 0) return NO_RISK_EXPLANATION
  return RISK_EXPLANATION_PREFIX + risks.join(", ")
}

// Advice depends only on whether any risk was found, not which one.
export function mitigationFor(risks: readonly RiskCategory[]): string {
  return risks.length === 0 ? NO_MITIGATION : RENEGOTIATE_MITIGATION
}
