#!/usr/bin/env npx tsx
/**
 * contract-risk CLI
 *
 * Usage:
 *   contract-risk analyze contract.txt --out reports/
 *   cat contract.txt | contract-risk analyze --json
 *   contract-risk analyze --sample lease-agreement
 *   contract-risk audit-log
 */

import { config as loadEnv } from "dotenv"
import { AuditLog } from "@/lib/audit"
import { loadConfig } from "@/lib/config"
import { toAppError, type AppError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { buildReportLayout, renderReportText } from "@/lib/report"
import { flushObservability, initObservability } from "@/instrument"
import { parseCliArgs, USAGE } from "./args"
import { runAnalyzeCommand, runAuditLogCommand, type CommandContext } from "./commands"
import { readContractInput } from "./input"

loadEnv({ path: [".env.local", ".env"] })

function fail(error: AppError): void {
  console.error(`❌ ${error.message}`)
  for (const detail of error.details ?? []) {
    console.error(`   ${detail.field ? `${detail.field}: ` : ""}${detail.message}`)
  }
  process.exitCode = error.exitCode
}

async function run(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2))
  if (!parsed.ok) {
    fail(parsed.error)
    console.error(`\n${USAGE}`)
    return
  }

  const command = parsed.value
  if (command.command === "help") {
    console.log(USAGE)
    return
  }

  const config = loadConfig()
  initObservability(config)

  const ctx: CommandContext = {
    auditLog: new AuditLog(config.auditFile),
    reportDir: config.reportDir,
    reportFont: config.reportFont,
  }

  if (command.command === "audit-log") {
    const result = await runAuditLogCommand(ctx)
    if (!result.ok) return fail(result.error)
    if (result.value.lines.length > 0) console.log(result.value.lines.join("\n"))
    return
  }

  const input = await readContractInput(command, process.stdin)
  const result = await runAnalyzeCommand(ctx, {
    text: input.text,
    source: input.source,
    outDir: command.outDir,
  })
  if (!result.ok) return fail(result.error)

  const { analysis, reportPath } = result.value
  if (command.json) {
    console.log(JSON.stringify({ ...analysis, reportPath }, null, 2))
    return
  }

  console.log(renderReportText(buildReportLayout(analysis)))
  console.log(`📄 Report saved to ${reportPath}`)
}

async function main(): Promise<void> {
  try {
    await run()
  } catch (error) {
    const appError = toAppError(error)
    logger.error("CLI failed", { code: appError.code, message: appError.message })
    fail(appError)
  } finally {
    await flushObservability()
  }
}

main().catch((e) => {
  console.error("Unexpected failure:", e)
  process.exit(1)
})
