export {
  formatReport,
  formatReportAsText,
  formatReportAsJson,
  formatErrorEntry,
} from './report-formatter.js';
export type { ReportFormat } from './report-formatter.js';
