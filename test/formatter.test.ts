import { describe, expect, it } from 'vitest';
import {
  EMPTY_REPORT_MESSAGE,
  formatCents,
  formatCostReport,
  formatCostReportAsJson,
  formatCostReportAsTable,
} from '../src/cost-reporter/formatter';
import type { CostBucket, CostReport } from '../src/cost-reporter/types';

function reportOf(buckets: CostBucket[], pages = ['{"data":[]}']): CostReport {
  return {
    range: { start: '2026-01-29', end: '2026-01-30' },
    buckets,
    totalCents: buckets.reduce((sum, bucket) => sum + bucket.amountCents, 0),
    pages,
  };
}

describe('formatCents', () => {
  it.each([
    [0, '0.00'],
    [5, '0.05'],
    [280, '2.80'],
    [123405, '1234.05'],
    [-5, '-0.05'],
    [-1999, '-19.99'],
  ])('formats %i cents as %s', (cents, expected) => {
    expect(formatCents(cents)).toBe(expected);
  });
});

describe('formatCostReportAsTable', () => {
  it('prints one row per day, a separator and the total', () => {
    const table = formatCostReportAsTable(
      reportOf([
        { date: '2026-01-29', amountCents: 467 },
        { date: '2026-01-30', amountCents: 280 },
      ])
    );

    expect(table.split('\n')).toEqual([
      'Date                 Cost',
      '-------------------------',
      '2026-01-29   $      4.67',
      '2026-01-30   $      2.80',
      '-------------------------',
      'Total        $      7.47',
      '',
    ]);
  });

  it('does not synthesize missing days', () => {
    const table = formatCostReportAsTable(
      reportOf([
        { date: '2026-01-01', amountCents: 100 },
        { date: '2026-01-05', amountCents: 123405 },
      ])
    );

    const rows = table.split('\n').filter((line) => /^\d{4}-/.test(line));
    expect(rows).toEqual(['2026-01-01   $      1.00', '2026-01-05   $   1234.05']);
  });

  it('totals many small amounts in integer cents', () => {
    const buckets = Array.from({ length: 1000 }, (_, i) => ({
      date: `2026-01-${String((i % 28) + 1).padStart(2, '0')}`,
      amountCents: 1,
    }));
    const lines = formatCostReportAsTable(reportOf(buckets)).split('\n');

    expect(lines[lines.length - 2]).toBe('Total        $     10.00');
  });

  it('prints a notice when there is nothing to show', () => {
    expect(formatCostReportAsTable(reportOf([]))).toBe(`${EMPTY_REPORT_MESSAGE}\n`);
  });
});

describe('formatCostReportAsJson', () => {
  it('returns the payload byte for byte', () => {
    const raw = '{ "data" : [ {"starting_at":"2026-01-29T00:00:00Z","results":[{"amount":"467"}]} ],\n"has_more":false}';
    const report = reportOf([{ date: '2026-01-29', amountCents: 467 }], [raw]);

    expect(formatCostReportAsJson(report)).toBe(raw);
    expect(formatCostReport(report, 'json')).toBe(raw);
  });

  it('prints every page unchanged, one per line', () => {
    const first = '{"data":[],"has_more":true,"next_page":"page_2"}';
    const second = '{"data":[],"has_more":false,"next_page":null}';

    expect(formatCostReportAsJson(reportOf([], [first, second]))).toBe(`${first}\n${second}`);
  });
});
