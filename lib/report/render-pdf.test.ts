import { describe, it, expect } from "vitest"
import { renderReportPdf, latinFallback, REPORT_FILE_NAME, REPORT_MIME_TYPE } from "./render-pdf"
import { analyzeContract } from "@/lib/contract-analysis"
import { ReportGenerationError } from "@/lib/errors"
import { EMPLOYMENT_SNIPPET, LEASE_AGREEMENT } from "@/lib/sample-contracts"

describe("latinFallback", () => {
  it("spells out the rupee sign", () => {
    expect(latinFallback("₹1,00,000")).toBe("Rs.1,00,000")
  })

  it("keeps Latin-1 text", () => {
    expect(latinFallback("Café clause")).toBe("Café clause")
  })

  it("replaces each other code point with a question mark", () => {
    expect(latinFallback("दंड")).toBe("???")
    expect(latinFallback("ok 😀")).toBe("ok ?")
  })
})

describe("renderReportPdf", () => {
  it("exposes the download name and MIME type", () => {
    expect(REPORT_FILE_NAME).toBe("Contract_Risk_Report.pdf")
    expect(REPORT_MIME_TYPE).toBe("application/pdf")
  })

  it("renders a complete PDF document", async () => {
    const pdf = await renderReportPdf(analyzeContract(EMPLOYMENT_SNIPPET.rawText), {
      generatedAt: new Date(Date.UTC(2025, 0, 1)),
    })
    const raw = pdf.toString("latin1")

    expect(raw.startsWith("%PDF-")).toBe(true)
    expect(raw.trimEnd().endsWith("%%EOF")).toBe(true)
    expect(raw).toContain("(Contract Risk Assessment Report)")
  })

  it("renders Hindi clauses with the built-in font", async () => {
    const pdf = await renderReportPdf(analyzeContract(LEASE_AGREEMENT.rawText))
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-")
  })

  it("renders a document without clauses", async () => {
    const pdf = await renderReportPdf(analyzeContract(""))
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-")
  })

  it("rejects with ReportGenerationError when the font cannot be loaded", async () => {
    await expect(
      renderReportPdf(analyzeContract(EMPLOYMENT_SNIPPET.rawText), {
        fontPath: "/nonexistent/fonts/NotoSansDevanagari-Regular.ttf",
      })
    ).rejects.toBeInstanceOf(ReportGenerationError)
  })
})
