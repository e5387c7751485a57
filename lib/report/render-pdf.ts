import PDFDocument from "pdfkit"
import type { ContractAnalysis } from "@/lib/contract-analysis"
import { ReportGenerationError } from "@/lib/errors"
import { buildReportLayout, REPORT_TITLE, type ReportBlock } from "./layout"

export const REPORT_FILE_NAME = "Contract_Risk_Report.pdf"
export const REPORT_MIME_TYPE = "application/pdf"

export interface RenderReportOptions {
  /**
   * TrueType/OpenType font used for all text. Needed to render Devanagari;
   * without it the built-in Helvetica is used and non-Latin-1 text is
   * substituted.
   */
  fontPath?: string
  /** Stamped into the PDF metadata */
  generatedAt?: Date
}

interface ReportFonts {
  regular: string
  bold: string
  /** Built-in fonts only encode Latin-1 */
  latinOnly: boolean
}

/**
 * Replace characters the built-in PDF fonts cannot encode.
 * The rupee sign becomes "Rs."; anything else outside Latin-1 becomes "?".
 */
export function latinFallback(text: string): string {
  return text.replace(/₹/g, "Rs.").replace(/[^\u0000-\u00ff]/gu, "?")
}

function registerFonts(doc: PDFKit.PDFDocument, fontPath?: string): ReportFonts {
  if (!fontPath) {
    return { regular: "Helvetica", bold: "Helvetica-Bold", latinOnly: true }
  }
  doc.registerFont("ReportBody", fontPath)
  return { regular: "ReportBody", bold: "ReportBody", latinOnly: false }
}

function drawBlock(doc: PDFKit.PDFDocument, block: ReportBlock, fonts: ReportFonts): void {
  const text = (value: string) => (fonts.latinOnly ? latinFallback(value) : value)

  switch (block.kind) {
    case "title":
      doc.font(fonts.bold).fontSize(20).fillColor("#0f172a").text(text(block.text), { align: "center" })
      break
    case "heading":
      doc.font(fonts.bold).fontSize(13).fillColor("#0f172a").text(text(block.text))
      doc.moveDown(0.3)
      break
    case "field":
      doc.font(fonts.bold).fontSize(10.5).fillColor("#334155").text(`${text(block.label)}: `, { continued: true })
      doc.font(fonts.regular).fillColor("#000000").text(text(block.value))
      break
    case "note":
      doc.font(fonts.regular).fontSize(10.5).fillColor("#64748b").text(text(block.text))
      break
    case "spacer":
      doc.moveDown(block.lines)
      break
  }
}

/**
 * Render the analysis as a complete in-memory PDF.
 *
 * Resolves only once the document stream has ended; any failure rejects with
 * ReportGenerationError and no partial buffer.
 */
export function renderReportPdf(
  analysis: ContractAnalysis,
  options: RenderReportOptions = {}
): Promise<Buffer> {
  const blocks = buildReportLayout(analysis)

  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = []
      const doc = new PDFDocument({
        size: "A4",
        margins: { top: 56, bottom: 56, left: 56, right: 56 },
        info: {
          Title: REPORT_TITLE,
          Subject: analysis.contractType,
          Creator: "contract-risk-annotator",
          CreationDate: options.generatedAt ?? new Date(),
        },
      })

      doc.on("data", (chunk: Buffer) => chunks.push(chunk))
      doc.on("end", () => resolve(Buffer.concat(chunks)))
      doc.on("error", (error: Error) =>
        reject(new ReportGenerationError(`PDF rendering failed: ${error.message}`))
      )

      const fonts = registerFonts(doc, options.fontPath)
      for (const block of blocks) drawBlock(doc, block, fonts)

      doc.end()
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      reject(new ReportGenerationError(`PDF rendering failed: ${reason}`))
    }
  })
}
