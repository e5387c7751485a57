/**
 * @fileoverview Contract analysis pipeline
 *
 * Runs every stage over one document:
 *
 *   raw text ─┬─ segmentClauses ─→ per clause: tag → detect → level → explain
 *             ├─ classifyContract
 *             └─ extractEntities
 *
 * The whole-document scans never see the clause list and the per-clause
 * stages never see each other's output, so the result is a pure function
 * of the input text.
 *
 * @module lib/contract-analysis/analyze
 */

import { segmentClauses } from "./segmenter"
import { classifyContract } from "./contract-classifier"
import { extractEntities } from "./entity-extractor"
import { tagClause } from "./clause-tagger"
import { detectRisks, riskLevelFor } from "./risk-detector"
import { explainRisks, mitigationFor } from "./explainer"
import { compositeRiskScore } from "./scoring"
import type { Clause, ClauseResult, ContractAnalysis } from "./types"

/**
 * Tag, score and explain a single clause.
 */
export function analyzeClause(clause: Clause): ClauseResult {
  const risks = detectRisks(clause.text)

  return {
    clause,
    clauseType: tagClause(clause.text),
    risks,
    riskCount: risks.length,
    riskLevel: riskLevelFor(risks.length),
    explanation: explainRisks(risks),
    mitigation: mitigationFor(risks),
  }
}

/**
 * Analyze a contract end to end.
 *
 * Never throws. A document without qualifying clauses yields an empty
 * clause list and a `null` composite score.
 */
export function analyzeContract(text: string): ContractAnalysis {
  const clauses = segmentClauses(text).map(analyzeClause)

  return {
    contractType: classifyContract(text),
    entities: extractEntities(text),
    clauses,
    compositeRiskScore: compositeRiskScore(clauses.map((c) => c.riskCount)),
  }
}
