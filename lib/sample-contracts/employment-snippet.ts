import type { SampleContract } from "./index"

export const EMPLOYMENT_SNIPPET: SampleContract = {
  id: "employment-snippet",
  title: "Employment Terms Snippet",
  description:
    "Four one-line employment clauses covering indemnity, unilateral termination, a rupee penalty and a non-compete.",
  expectedClauseCount: 4,
  expectedContractType: "Employment Agreement",
  rawText:
    "The employee shall indemnify the company.\n" +
    "The company may terminate the agreement without notice.\n" +
    "A penalty of ₹1,00,000 applies for breach.\n" +
    "The employee shall not compete for two years.",
}
