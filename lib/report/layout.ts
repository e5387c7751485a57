/**
 * @fileoverview Report layout
 *
 * Turns a ContractAnalysis into an ordered list of typed blocks. The PDF
 * renderer only draws blocks, so everything the report says is decided (and
 * tested) here.
 *
 * @module lib/report/layout
 */

import type { ContractAnalysis } from "@/lib/contract-analysis"
import { formatCompositeScore, formatEntityList } from "./format"

export const REPORT_TITLE = "Contract Risk Assessment Report"

export type ReportBlock =
  | { kind: "title"; text: string }
  | { kind: "heading"; text: string }
  | { kind: "field"; label: string; value: string }
  | { kind: "note"; text: string }
  | { kind: "spacer"; lines: number }

export function buildReportLayout(analysis: ContractAnalysis): ReportBlock[] {
  const { entities } = analysis

  const blocks: ReportBlock[] = [
    { kind: "title", text: REPORT_TITLE },
    { kind: "spacer", lines: 1 },
    { kind: "heading", text: "Contract Overview" },
    { kind: "field", label: "Contract Type", value: analysis.contractType },
    { kind: "field", label: "Overall Risk Score", value: formatCompositeScore(analysis.compositeRiskScore) },
    { kind: "spacer", lines: 1 },
    { kind: "heading", text: "Extracted Key Information" },
    { kind: "field", label: "Amounts", value: formatEntityList(entities.amounts) },
    { kind: "field", label: "Dates", value: formatEntityList(entities.dates) },
    { kind: "field", label: "Jurisdiction", value: formatEntityList(entities.jurisdiction) },
    { kind: "spacer", lines: 1 },
    { kind: "heading", text: "Clause-by-Clause Analysis" },
  ]

  if (analysis.clauses.length === 0) {
    blocks.push({ kind: "note", text: "No clauses longer than 30 characters were found." })
    return blocks
  }

  for (const result of analysis.clauses) {
    blocks.push(
      { kind: "field", label: `Clause ${result.clause.ordinal}`, value: result.clause.text },
      { kind: "field", label: "Clause Type", value: result.clauseType },
      { kind: "field", label: "Risk Level", value: result.riskLevel },
      { kind: "field", label: "Explanation", value: result.explanation },
      { kind: "field", label: "Mitigation Advice", value: result.mitigation },
      { kind: "spacer", lines: 0.8 }
    )
  }

  return blocks
}
