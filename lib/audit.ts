/**
 * @fileoverview File-backed audit trail
 *
 * The log is a single JSON array of `{ timestamp, action }` objects. Every
 * append reads the whole array, adds one entry and rewrites the file.
 *
 * Appends within one process are serialised per file through a p-limit
 * queue of size 1, and each rewrite goes to a temporary file that is then
 * renamed over the log, so readers never observe a half-written array.
 * Separate processes appending to the same file are NOT coordinated: two of
 * them can read the same prior state and one append is lost.
 *
 * @module lib/audit
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises"
import path from "node:path"
import pLimit, { type LimitFunction } from "p-limit"
import { z } from "zod"
import { AuditLogCorruptError, AuditLogIoError } from "@/lib/errors"
import { logger } from "@/lib/logger"

// ============================================================================
// Types
// ============================================================================

export const auditEntrySchema = z.object({
  /** `DD-MM-YYYY HH:MM:SS`, UTC */
  timestamp: z.string(),
  action: z.string(),
})

export type AuditEntry = z.infer<typeof auditEntrySchema>

const auditLogSchema = z.array(auditEntrySchema)

/** Actions recorded by the CLI */
export const AUDIT_ACTIONS = {
  CONTRACT_ANALYZED: "Contract analyzed",
  REPORT_GENERATED: "PDF report generated",
} as const

// ============================================================================
// Helpers
// ============================================================================

const pad = (value: number) => String(value).padStart(2, "0")

/**
 * Format a date as `DD-MM-YYYY HH:MM:SS` in UTC.
 */
export function formatAuditTimestamp(date: Date): string {
  const day = `${pad(date.getUTCDate())}-${pad(date.getUTCMonth() + 1)}-${date.getUTCFullYear()}`
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  return `${day} ${time}`
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// One writer queue per resolved file path, shared by every AuditLog instance
const writers = new Map<string, LimitFunction>()

function writerFor(filePath: string): LimitFunction {
  let limit = writers.get(filePath)
  if (!limit) {
    limit = pLimit(1)
    writers.set(filePath, limit)
  }
  return limit
}

// ============================================================================
// Audit Log
// ============================================================================

export class AuditLog {
  readonly filePath: string

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath)
  }

  /**
   * Read every entry in append order.
   *
   * @returns `null` when the log file does not exist yet
   * @throws {AuditLogCorruptError} when the file is not a valid entry array
   * @throws {AuditLogIoError} on any other read failure
   */
  async read(): Promise<AuditEntry[] | null> {
    let raw: string
    try {
      raw = await readFile(this.filePath, "utf-8")
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return null
      throw new AuditLogIoError(this.filePath, errorMessage(error))
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (error) {
      logger.error("Audit log is not valid JSON", { path: this.filePath })
      throw new AuditLogCorruptError(this.filePath, errorMessage(error))
    }

    const parsed = auditLogSchema.safeParse(data)
    if (!parsed.success) {
      logger.error("Audit log has an unexpected shape", { path: this.filePath })
      throw new AuditLogCorruptError(
        this.filePath,
        "expected an array of { timestamp, action } objects",
        parsed.error.issues.map((issue) => ({
          field: issue.path.map(String).join("."),
          message: issue.message,
        }))
      )
    }

    return parsed.data
  }

  /**
   * Append one entry and persist the whole log.
   *
   * A corrupt log is never overwritten; the append fails instead.
   */
  append(action: string, now: Date = new Date()): Promise<AuditEntry> {
    return writerFor(this.filePath)(async () => {
      const entries = (await this.read()) ?? []
      const entry: AuditEntry = { timestamp: formatAuditTimestamp(now), action }
      entries.push(entry)

      await this.write(entries)
      logger.info("Audit entry appended", {
        action,
        path: this.filePath,
        entryCount: entries.length,
      })
      return entry
    })
  }

  private async write(entries: AuditEntry[]): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true })
      await writeFile(tmpPath, JSON.stringify(entries, null, 2), "utf-8")
      await rename(tmpPath, this.filePath)
    } catch (error) {
      throw new AuditLogIoError(this.filePath, errorMessage(error))
    }
  }
}
