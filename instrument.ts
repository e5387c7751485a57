import * as Sentry from "@sentry/node"
import type { AppConfig } from "@/lib/config"

/**
 * Initialise Sentry for the CLI process.
 *
 * Without a DSN nothing is sent and `logger` calls are dropped.
 *
 * @returns whether Sentry was initialised
 */
export function initObservability(config: Pick<AppConfig, "sentryDsn" | "env">): boolean {
  if (!config.sentryDsn) return false

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.env,

    // Enable structured logging
    enableLogs: true,

    integrations: [
      // Console integration - captures console.warn, console.error
      Sentry.consoleLoggingIntegration({
        levels: ["warn", "error"],
      }),
    ],

    // Production: 10%, Development: 100%
    tracesSampleRate: config.env === "production" ? 0.1 : 1.0,

    debug: false,
  })

  return true
}

/**
 * Flush buffered logs before the process exits.
 */
export async function flushObservability(timeoutMs = 2000): Promise<void> {
  await Sentry.flush(timeoutMs)
}
