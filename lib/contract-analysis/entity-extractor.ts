import { RULES } from "./rules"
import type { EntityBag } from "./types"

// Digits are any Unicode decimal digit, so Devanagari numerals (१५/०८/२०२४) match too

/**
 * Rupee amounts (`₹1,00,000`, `₹ 2500.50`) or a number followed by an Indian
 * unit word (`5 lakhs`, `1.2crore`). Applied to lower-cased text.
 */
const AMOUNT_PATTERN = /₹\s?\p{Nd}+(?:,\p{Nd}+)*(?:\.\p{Nd}+)?|\p{Nd}+(?:\.\p{Nd}+)?\s?(?:lakhs?|crores?)/gu

/** D/M/YYYY through DD/MM/YYYY. No calendar validation. */
const DATE_PATTERN = /\p{Nd}{1,2}\/\p{Nd}{1,2}\/\p{Nd}{4}/gu

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

const JURISDICTION_PATTERN = new RegExp(
  RULES.jurisdictions.map(escapeRegExp).join("|"),
  "g"
)

function findAll(pattern: RegExp, text: string): string[] {
  return Array.from(text.matchAll(pattern), (m) => m[0])
}

/**
 * Scan the whole document for amounts, dates and jurisdictions.
 *
 * Amounts and jurisdictions are returned lower-cased, as matched in the
 * lower-cased text. Place names are recognised in Latin script only.
 */
export function extractEntities(text: string): EntityBag {
  const lowered = text.toLowerCase()

  return {
    amounts: findAll(AMOUNT_PATTERN, lowered),
    dates: findAll(DATE_PATTERN, text),
    jurisdiction: findAll(JURISDICTION_PATTERN, lowered),
  }
}
