import { z } from "zod"

// ============================================================================
// Contract Types
// ============================================================================

/** Whole-document labels, in classifier test order; the last is the fallback */
export const CONTRACT_TYPES = [
  "Employment Agreement",
  "Lease Agreement",
  "Service Contract",
  "Vendor Agreement",
  "General Commercial Contract",
] as const

export type ContractType = (typeof CONTRACT_TYPES)[number]

export const contractTypeSchema = z.enum(CONTRACT_TYPES)

export const DEFAULT_CONTRACT_TYPE = "General Commercial Contract" as const satisfies ContractType

// ============================================================================
// Clause Modality
// ============================================================================

/** Modality labels; Neutral is assigned when no keyword group matches */
export const CLAUSE_TYPES = ["Prohibition", "Obligation", "Right", "Neutral"] as const

export type ClauseType = (typeof CLAUSE_TYPES)[number]

export const clauseTypeSchema = z.enum(CLAUSE_TYPES)

// ============================================================================
// Risk
// ============================================================================

export const RISK_CATEGORIES = [
  "Penalty Clause",
  "Indemnity Clause",
  "Termination Risk",
  "Non-Compete Clause",
  "IP Transfer",
  "Unilateral Rights",
] as const

export type RiskCategory = (typeof RISK_CATEGORIES)[number]

export const riskCategorySchema = z.enum(RISK_CATEGORIES)

/** Per-clause level from the risk count; the composite score has none */
export type RiskLevel = "Low" | "Medium" | "High"

// ============================================================================
// Pipeline Values
// ============================================================================

/** A trimmed fragment of the source document, longer than the minimum length */
export interface Clause {
  /** 1-based position in document order */
  ordinal: number
  text: string
}

/**
 * Entities found by pattern scans over the whole document.
 * Matches keep document order; duplicates are not removed.
 */
export interface EntityBag {
  amounts: string[]
  dates: string[]
  jurisdiction: string[]
}

export interface ClauseResult {
  clause: Clause
  clauseType: ClauseType
  /** Matched categories in rule declaration order */
  risks: RiskCategory[]
  riskCount: number
  riskLevel: RiskLevel
  explanation: string
  mitigation: string
}

export interface ContractAnalysis {
  contractType: ContractType
  entities: EntityBag
  clauses: ClauseResult[]
  /**
   * Mean of per-clause risk counts, 2 decimals. `null` when segmentation
   * produced no clauses. Deliberately not bucketed into a RiskLevel.
   */
  compositeRiskScore: number | null
}
