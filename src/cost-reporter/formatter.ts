import type { CostReport, OutputFormat } from './types';

const DATE_WIDTH = 12;
const AMOUNT_WIDTH = 10;
const SEPARATOR = '-'.repeat(25);

export const EMPTY_REPORT_MESSAGE = 'No cost data found for the specified period.';

/** Integer cents to a two-decimal dollar string without going through floating point. */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const absolute = Math.abs(cents);
  const dollars = Math.floor(absolute / 100);
  const remainder = String(absolute % 100).padStart(2, '0');
  return `${sign}${dollars}.${remainder}`;
}

function formatRow(label: string, cents: number): string {
  return `${label.padEnd(DATE_WIDTH)} $${formatCents(cents).padStart(AMOUNT_WIDTH)}`;
}

export function formatCostReportAsTable(report: CostReport): string {
  if (report.buckets.length === 0) {
    return `${EMPTY_REPORT_MESSAGE}\n`;
  }

  const lines = [
    `${'Date'.padEnd(DATE_WIDTH)} ${'Cost'.padStart(DATE_WIDTH)}`,
    SEPARATOR,
    ...report.buckets.map((bucket) => formatRow(bucket.date, bucket.amountCents)),
    SEPARATOR,
    formatRow('Total', report.totalCents),
  ];

  return `${lines.join('\n')}\n`;
}

/**
 * The response body exactly as received. A report that spanned several pages prints each
 * page's body unchanged, one after another, separated by a newline.
 */
export function formatCostReportAsJson(report: CostReport): string {
  return report.pages.join('\n');
}

export function formatCostReport(report: CostReport, format: OutputFormat): string {
  switch (format) {
    case 'table':
      return formatCostReportAsTable(report);
    case 'json':
      return formatCostReportAsJson(report);
  }
}
