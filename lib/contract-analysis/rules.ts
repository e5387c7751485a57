/**
 * @fileoverview Keyword rule tables
 *
 * Loads `rules.json` once at module initialisation, validates it and freezes
 * the result. Every table is an ordered list: classifiers walk it front to
 * back and the first hit wins, so array order is part of the contract.
 *
 * @module lib/contract-analysis/rules
 */

import { z } from "zod"
import rawRules from "./rules.json"
import {
  clauseTypeSchema,
  contractTypeSchema,
  riskCategorySchema,
  DEFAULT_CONTRACT_TYPE,
} from "./types"

// ============================================================================
// Schema
// ============================================================================

const keywordsSchema = z
  .array(z.string().min(1))
  .min(1)
  .refine((words) => words.every((w) => w === w.toLowerCase()), {
    message: "Keywords must be lower-case",
  })

function ruleTableSchema<L extends string>(label: z.ZodType<L>) {
  return z
    .array(z.object({ label, keywords: keywordsSchema }))
    .refine((rules) => new Set(rules.map((r) => r.label)).size === rules.length, {
      message: "Duplicate rule label",
    })
}

export const rulesSchema = z.object({
  contractTypes: ruleTableSchema(contractTypeSchema.exclude([DEFAULT_CONTRACT_TYPE])),
  // Neutral is the fallback and never has keywords
  clauseTypes: ruleTableSchema(clauseTypeSchema.exclude(["Neutral"])),
  riskCategories: ruleTableSchema(riskCategorySchema),
  jurisdictions: keywordsSchema,
})

export type KeywordRules = z.infer<typeof rulesSchema>

export interface KeywordRule<L extends string> {
  readonly label: L
  readonly keywords: readonly string[]
}

// ============================================================================
// Loading
// ============================================================================

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const nested of Object.values(value)) deepFreeze(nested)
    Object.freeze(value)
  }
  return value
}

/**
 * Validate and freeze a rule document.
 *
 * @throws {z.ZodError} when the document is malformed
 */
export function parseRules(input: unknown): Readonly<KeywordRules> {
  return deepFreeze(rulesSchema.parse(input))
}

export const RULES = parseRules(rawRules)

/**
 * Return the label of the first rule with a keyword contained in `lowered`.
 *
 * `lowered` must already be lower-cased.
 */
export function firstMatchingRule<L extends string>(
  rules: readonly KeywordRule<L>[],
  lowered: string
): L | undefined {
  return rules.find((rule) => rule.keywords.some((k) => lowered.includes(k)))?.label
}

/**
 * Return every rule label with a keyword contained in `lowered`, in table order.
 */
export function allMatchingRules<L extends string>(
  rules: readonly KeywordRule<L>[],
  lowered: string
): L[] {
  return rules
    .filter((rule) => rule.keywords.some((k) => lowered.includes(k)))
    .map((rule) => rule.label)
}
