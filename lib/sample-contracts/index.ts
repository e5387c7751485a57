/**
 * @fileoverview Sample Contracts for Testing
 *
 * Built-in sample contracts for one-command pipeline runs
 * (`contract-risk analyze --sample <id>`) and for tests.
 *
 * @module lib/sample-contracts
 */

import type { ContractType } from "@/lib/contract-analysis"

export interface SampleContract {
  /** Unique identifier for the sample */
  id: string
  /** Human-readable title */
  title: string
  /** Brief description of what this sample covers */
  description: string
  /** Raw contract text */
  rawText: string
  /** Number of clauses the segmenter should produce */
  expectedClauseCount: number
  expectedContractType: ContractType
}

export { EMPLOYMENT_SNIPPET } from "./employment-snippet"
export { LEASE_AGREEMENT } from "./lease-agreement"

import { EMPLOYMENT_SNIPPET } from "./employment-snippet"
import { LEASE_AGREEMENT } from "./lease-agreement"

/** All sample contracts for iteration */
export const SAMPLE_CONTRACTS: SampleContract[] = [EMPLOYMENT_SNIPPET, LEASE_AGREEMENT]

export function findSampleContract(id: string): SampleContract | undefined {
  return SAMPLE_CONTRACTS.find((sample) => sample.id === id)
}
