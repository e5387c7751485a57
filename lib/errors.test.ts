import { describe, it, expect } from "vitest"
import {
  AppError,
  ValidationError,
  NotFoundError,
  InternalError,
  AuditLogCorruptError,
  AuditLogIoError,
  ReportGenerationError,
  isAppError,
  toAppError,
} from "./errors"

describe("Error Classes", () => {
  describe("AppError", () => {
    it("creates error with all properties", () => {
      const error = new AppError("VALIDATION_ERROR", "Something went wrong", 2, [
        { field: "text", message: "Required" },
      ])

      expect(error.code).toBe("VALIDATION_ERROR")
      expect(error.message).toBe("Something went wrong")
      expect(error.exitCode).toBe(2)
      expect(error.details).toEqual([{ field: "text", message: "Required" }])
      expect(error.isOperational).toBe(true)
      expect(error.name).toBe("AppError")
    })

    it("defaults exit code to 1", () => {
      expect(new AppError("INTERNAL_ERROR", "boom").exitCode).toBe(1)
    })

    it("serializes to JSON without details when absent", () => {
      const error = new AppError("NOT_FOUND", "Sample not found", 2)

      expect(error.toJSON()).toEqual({
        code: "NOT_FOUND",
        message: "Sample not found",
      })
    })

    it("includes details in JSON when present", () => {
      const error = new AppError("VALIDATION_ERROR", "Invalid", 2, [
        { field: "CONTRACT_AUDIT_FILE", message: "Required" },
      ])

      expect(error.toJSON().details).toEqual([
        { field: "CONTRACT_AUDIT_FILE", message: "Required" },
      ])
    })
  })

  describe("Specialized Error Classes", () => {
    it("ValidationError has correct defaults", () => {
      const error = new ValidationError()
      expect(error.code).toBe("VALIDATION_ERROR")
      expect(error.exitCode).toBe(2)
      expect(error.message).toBe("Validation failed")
    })

    it("ValidationError.fromZodError converts Zod issues", () => {
      const zodError = {
        issues: [
          { path: ["SENTRY_DSN"], message: "Invalid URL" },
          { path: ["rules", 0, "label"], message: "Required" },
        ],
      }

      const error = ValidationError.fromZodError(zodError)

      expect(error.details).toEqual([
        { field: "SENTRY_DSN", message: "Invalid URL" },
        { field: "rules.0.label", message: "Required" },
      ])
    })

    it("NotFoundError has correct defaults", () => {
      const error = new NotFoundError("Contract file not found")
      expect(error.code).toBe("NOT_FOUND")
      expect(error.exitCode).toBe(2)
      expect(error.message).toBe("Contract file not found")
    })

    it("InternalError has correct defaults", () => {
      const error = new InternalError()
      expect(error.code).toBe("INTERNAL_ERROR")
      expect(error.exitCode).toBe(1)
    })

    it("AuditLogCorruptError names the file and reason", () => {
      const error = new AuditLogCorruptError("/tmp/audit.json", "not an array")
      expect(error.code).toBe("AUDIT_LOG_CORRUPT")
      expect(error.path).toBe("/tmp/audit.json")
      expect(error.message).toBe("Audit log at /tmp/audit.json is corrupt: not an array")
    })

    it("AuditLogIoError names the file and reason", () => {
      const error = new AuditLogIoError("/tmp/audit.json", "EACCES")
      expect(error.code).toBe("AUDIT_LOG_IO_FAILED")
      expect(error.message).toBe("Audit log I/O failed at /tmp/audit.json: EACCES")
    })

    it("ReportGenerationError has correct defaults", () => {
      const error = new ReportGenerationError()
      expect(error.code).toBe("REPORT_FAILED")
      expect(error.message).toBe("Report generation failed")
    })
  })

  describe("isAppError", () => {
    it("returns true for AppError instances", () => {
      expect(isAppError(new AppError("INTERNAL_ERROR", "test"))).toBe(true)
      expect(isAppError(new NotFoundError())).toBe(true)
      expect(isAppError(new ReportGenerationError())).toBe(true)
    })

    it("returns false for non-AppError values", () => {
      expect(isAppError(new Error("test"))).toBe(false)
      expect(isAppError("string")).toBe(false)
      expect(isAppError(null)).toBe(false)
      expect(isAppError({ code: "ERROR" })).toBe(false)
    })
  })

  describe("toAppError", () => {
    it("returns AppError unchanged", () => {
      const original = new NotFoundError("Test")
      expect(toAppError(original)).toBe(original)
    })

    it("wraps regular Error in InternalError", () => {
      const result = toAppError(new Error("Something broke"))
      expect(result).toBeInstanceOf(InternalError)
      expect(result.code).toBe("INTERNAL_ERROR")
    })

    it("wraps non-Error values in InternalError", () => {
      expect(toAppError("string error")).toBeInstanceOf(InternalError)
      expect(toAppError(null)).toBeInstanceOf(InternalError)
      expect(toAppError({ custom: "error" })).toBeInstanceOf(InternalError)
    })
  })
})
