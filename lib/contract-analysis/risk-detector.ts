import { RULES, allMatchingRules } from "./rules"
import type { RiskCategory, RiskLevel } from "./types"

/**
 * Detect which risk categories a clause touches.
 *
 * Each category carries English and Hindi terms; a single substring hit in
 * either language is enough. Result order follows the rule table.
 */
export function detectRisks(text: string): RiskCategory[] {
  return allMatchingRules(RULES.riskCategories, text.toLowerCase())
}

/**
 * Map a risk-category count to a level: 0 Low, 1-2 Medium, 3+ High.
 */
export function riskLevelFor(count: number): RiskLevel {
  if (count <= 0) return "Low"
  if (count <= 2) return "Medium"
  return "High"
}
