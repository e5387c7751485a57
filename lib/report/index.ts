export { buildReportLayout, REPORT_TITLE, type ReportBlock } from "./layout"
export {
  renderReportPdf,
  latinFallback,
  REPORT_FILE_NAME,
  REPORT_MIME_TYPE,
  type RenderReportOptions,
} from "./render-pdf"
export { formatCompositeScore, formatEntityList, NOT_APPLICABLE, NOT_DETECTED } from "./format"
export { renderReportText } from "./render-text"
