import Papa from 'papaparse';
import type { ErrorReport } from '../domain/services/ErrorAggregator.js';

export const ERROR_REPORT_COLUMNS = [
  'file',
  'category',
  'errorType',
  'userAction',
  'recoverable',
  'recoveryHint',
  'message',
] as const;

/** One CSV row per aggregated error, header first. Built with PapaParse. */
export function formatErrorReportCsv(report: ErrorReport): string {
  return Papa.unparse(
    {
      fields: [...ERROR_REPORT_COLUMNS],
      data: report.errors.map((entry) => [
        entry.file,
        entry.category,
        entry.errorType,
        entry.userAction,
        entry.recoverable ? 'true' : 'false',
        entry.recoveryHint,
        entry.error.message,
      ]),
    },
    { newline: '\n' },
  );
}
