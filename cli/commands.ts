/**
 * @fileoverview CLI command handlers
 *
 * Each handler takes its collaborators through a context object and returns
 * a Result instead of printing, so the entry point owns all output and
 * exit codes and tests can drive handlers directly.
 *
 * @module cli/commands
 */

import { mkdir, rename, writeFile } from "node:fs/promises"
import path from "node:path"
import { analyzeContract, type ContractAnalysis } from "@/lib/contract-analysis"
import { AUDIT_ACTIONS, type AuditLog } from "@/lib/audit"
import { ReportGenerationError, toAppError, ValidationError, type AppError } from "@/lib/errors"
import { fmt, logger } from "@/lib/logger"
import { renderReportPdf, REPORT_FILE_NAME } from "@/lib/report"
import { map, tryCatchWith, type Result } from "@/lib/result"

// ============================================================================
// Types
// ============================================================================

export interface CommandContext {
  auditLog: AuditLog
  /** Default output directory for reports */
  reportDir: string
  reportFont?: string
  /** Clock used for audit timestamps and PDF metadata */
  now?: () => Date
}

export interface AnalyzeRequest {
  text: string
  /** Where the text came from, for logs */
  source: string
  outDir?: string
}

export interface AnalyzeOutcome {
  analysis: ContractAnalysis
  reportPath: string
  reportBytes: number
}

export interface AuditLogOutcome {
  lines: string[]
}

export const EMPTY_AUDIT_LOG_MESSAGE = "No audit logs available."

// ============================================================================
// analyze
// ============================================================================

async function writeReport(filePath: string, pdf: Buffer): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`
  try {
    await mkdir(path.dirname(filePath), { recursive: true })
    await writeFile(tmpPath, pdf)
    await rename(tmpPath, filePath)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ReportGenerationError(`Could not write report to ${filePath}: ${reason}`)
  }
}

/**
 * Analyze contract text, write the PDF report and record both steps in the
 * audit log.
 *
 * The report is only written once it has been rendered completely, so a
 * failed render never leaves a truncated PDF behind.
 */
export function runAnalyzeCommand(
  ctx: CommandContext,
  request: AnalyzeRequest
): Promise<Result<AnalyzeOutcome, AppError>> {
  const now = ctx.now ?? (() => new Date())

  return tryCatchWith(async () => {
    if (request.text.trim() === "") {
      throw new ValidationError("Contract text is empty", [
        { field: "text", message: "Provide contract text to analyze", code: "EMPTY_DOCUMENT" },
      ])
    }

    await ctx.auditLog.append(AUDIT_ACTIONS.CONTRACT_ANALYZED, now())

    const analysis = analyzeContract(request.text)
    logger.info("Contract analyzed", {
      source: request.source,
      contractType: analysis.contractType,
      clauseCount: analysis.clauses.length,
      compositeRiskScore: analysis.compositeRiskScore,
    })
    if (analysis.clauses.length === 0) {
      logger.warn("No qualifying clauses found", { source: request.source })
    }

    const pdf = await renderReportPdf(analysis, {
      fontPath: ctx.reportFont,
      generatedAt: now(),
    })
    const reportPath = path.resolve(request.outDir ?? ctx.reportDir, REPORT_FILE_NAME)
    await writeReport(reportPath, pdf)

    await ctx.auditLog.append(AUDIT_ACTIONS.REPORT_GENERATED, now())
    logger.info(fmt`Report written to ${reportPath} (${pdf.length} bytes)`)

    return { analysis, reportPath, reportBytes: pdf.length }
  }, toAppError)
}

// ============================================================================
// audit-log
// ============================================================================

/**
 * List audit entries as `<timestamp> — <action>` lines.
 *
 * A log file that does not exist yet yields the single "No audit logs
 * available." line; an existing but empty log yields no lines.
 */
export async function runAuditLogCommand(
  ctx: Pick<CommandContext, "auditLog">
): Promise<Result<AuditLogOutcome, AppError>> {
  const result = await tryCatchWith(() => ctx.auditLog.read(), toAppError)

  return map(result, (entries) => {
    if (entries === null) {
      return { lines: [EMPTY_AUDIT_LOG_MESSAGE] }
    }
    return { lines: entries.map((entry) => `${entry.timestamp} — ${entry.action}`) }
  })
}
