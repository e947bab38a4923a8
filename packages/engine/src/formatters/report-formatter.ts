/**
 * Report Formatter
 *
 * Renders a migration report as text for terminals or as JSON for tooling.
 */

import type { ErrorEntry, MigrationReport, MigrationResult } from '@rowshift/core';

export type ReportFormat = 'text' | 'json';

/** Errors listed per migration before the rest are summarized */
const MAX_LISTED_ERRORS = 20;

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * One line per error entry
 */
export function formatErrorEntry(entry: ErrorEntry): string {
  const parts = [`[${entry.stage}] ${entry.code}`];
  if (entry.batchIndex !== undefined) parts.push(`batch ${entry.batchIndex}`);
  if (entry.rowIdentifier) {
    parts.push(`${entry.rowIdentifier.column}=${formatValue(entry.rowIdentifier.value)}`);
  }
  return `${parts.join(' ')}: ${entry.message}`;
}

function formatMigration(result: MigrationResult): string[] {
  const lines = [
    `${result.name} -> ${result.targetTable}: ${result.status} (${result.durationMs}ms)`,
    `  read ${result.rowsRead}, transformed ${result.rowsTransformed}, skipped ${result.rowsSkipped}, failed transform ${result.rowsFailedTransform}`,
    `  written ${result.rowsWritten}, failed write ${result.rowsFailedWrite}, batches ${result.batchesCommitted} committed / ${result.batchesFailed} failed`,
  ];

  for (const entry of result.errors.slice(0, MAX_LISTED_ERRORS)) {
    lines.push(`  ${formatErrorEntry(entry)}`);
  }
  if (result.errors.length > MAX_LISTED_ERRORS) {
    lines.push(`  ... ${result.errors.length - MAX_LISTED_ERRORS} more error(s)`);
  }

  return lines;
}

/**
 * Format as plain text
 */
export function formatReportAsText(report: MigrationReport): string {
  const lines = [`Run ${report.runId}: ${report.status} (${report.durationMs}ms)`];

  if (report.migrations.length === 0) {
    lines.push('No migrations ran.');
  }
  for (const result of report.migrations) {
    lines.push(...formatMigration(result));
  }

  return lines.join('\n');
}

/**
 * Format as JSON; dates become ISO strings
 */
export function formatReportAsJson(report: MigrationReport): string {
  return JSON.stringify(
    report,
    (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
    2
  );
}

export function formatReport(report: MigrationReport, format: ReportFormat = 'text'): string {
  return format === 'json' ? formatReportAsJson(report) : formatReportAsText(report);
}
