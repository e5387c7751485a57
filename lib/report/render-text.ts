import type { ReportBlock } from "./layout"

/**
 * Render report blocks as plain text for terminal output.
 *
 * Titles are underlined with `=`, headings with `-`; spacers of any size
 * collapse to one blank line.
 */
export function renderReportText(blocks: readonly ReportBlock[]): string {
  const lines: string[] = []

  for (const block of blocks) {
    switch (block.kind) {
      case "title":
        lines.push(block.text, "=".repeat(block.text.length))
        break
      case "heading":
        lines.push(block.text, "-".repeat(block.text.length))
        break
      case "field":
        lines.push(`${block.label}: ${block.value}`)
        break
      case "note":
        lines.push(block.text)
        break
      case "spacer":
        if (block.lines > 0) lines.push("")
        break
    }
  }

  return lines.join("\n")
}
