/**
 * @fileoverview Runtime configuration
 *
 * Reads the process environment once, validates it with zod and exposes a
 * typed, frozen config object. Keyword rules are NOT configured here; they
 * ship with the analysis module and are fixed at build time.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ValidationError } from "@/lib/errors"

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  SENTRY_DSN: z.url().optional(),
  /** JSON array file holding the audit trail */
  CONTRACT_AUDIT_FILE: z.string().min(1).default("audit_log.json"),
  /** Directory the PDF report is written to */
  CONTRACT_REPORT_DIR: z.string().min(1).default("."),
  /** Optional TrueType font for non-Latin clause text in reports */
  CONTRACT_REPORT_FONT: z.string().min(1).optional(),
})

export interface AppConfig {
  env: "development" | "production" | "test"
  sentryDsn?: string
  auditFile: string
  reportDir: string
  reportFont?: string
}

/**
 * Parse configuration from an environment map.
 *
 * Empty strings are treated as unset so `FOO=` in a .env file falls back to
 * the default instead of failing validation.
 *
 * @throws {ValidationError} with one detail per invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  )

  const parsed = envSchema.safeParse(cleaned)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }

  const vars = parsed.data
  return Object.freeze({
    env: vars.NODE_ENV,
    sentryDsn: vars.SENTRY_DSN,
    auditFile: vars.CONTRACT_AUDIT_FILE,
    reportDir: vars.CONTRACT_REPORT_DIR,
    reportFont: vars.CONTRACT_REPORT_FONT,
  })
}
