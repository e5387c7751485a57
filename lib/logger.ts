import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Logs are shipped only after `initObservability()` has run with a DSN;
 * otherwise every call is a no-op.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Contract analyzed", { clauseCount: 4, contractType: "Lease Agreement" })
 * logger.warn("No clauses found", { textLength: 12 })
 * logger.error("Audit append failed", { path, error: err.message })
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Rendered report for ${clauseCount} clauses`)
 * ```
 */
export const logger = Sentry.logger

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt
