import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { EnrichmentRecord } from '../tools/finance/float-lookup.js';
import { OutputWriteError, errorMessage } from './errors.js';

export const CSV_HEADERS = ['symbol', 'float', 'shortName', 'exchange', 'marketCap'] as const;
export const CONSOLE_ROW_LIMIT = 100;
const SYMBOL_COLUMN_WIDTH = 10;

export type ReportRow = EnrichmentRecord & { float: number };

export function filterByFloat(records: readonly EnrichmentRecord[], cutoff: number): ReportRow[] {
  return records.filter((record): record is ReportRow => record.float !== null && record.float <= cutoff);
}

/** Tickers missing from the map are treated as not eligible. */
export function filterByEligibility(rows: readonly ReportRow[], eligibility: ReadonlyMap<string, boolean>): ReportRow[] {
  return rows.filter((row) => eligibility.get(row.symbol) === true);
}

// Array.prototype.sort is stable, so equal floats keep their input order.
export function sortByFloat(rows: readonly ReportRow[]): ReportRow[] {
  return [...rows].sort((a, b) => a.float - b.float);
}

export function buildReport(
  records: readonly EnrichmentRecord[],
  cutoff: number,
  eligibility: ReadonlyMap<string, boolean> | null
): ReportRow[] {
  const candidates = filterByFloat(records, cutoff);
  const eligible = eligibility ? filterByEligibility(candidates, eligibility) : candidates;
  return sortByFloat(eligible);
}

function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatReportCsv(rows: readonly ReportRow[]): string {
  const lines = [CSV_HEADERS.join(',')];
  for (const row of rows) {
    lines.push(
      [row.symbol, Math.trunc(row.float), row.shortName, row.exchange, row.marketCap].map(csvCell).join(',')
    );
  }
  return `${lines.join('\r\n')}\r\n`;
}

export async function writeReportCsv(outputPath: string, rows: readonly ReportRow[]): Promise<string> {
  const fullPath = path.resolve(outputPath);
  try {
    await mkdir(path.dirname(fullPath), { recursive: true });
    await writeFile(fullPath, formatReportCsv(rows), 'utf8');
  } catch (error) {
    throw new OutputWriteError({
      message: `Failed to write report to ${fullPath}: ${errorMessage(error)}`,
      path: fullPath,
    });
  }
  return fullPath;
}

function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

export function formatConsoleSummary(
  rows: readonly ReportRow[],
  cutoff: number,
  limit: number = CONSOLE_ROW_LIMIT
): string[] {
  const lines = [`Found ${rows.length} tickers with float <= ${formatCount(cutoff)}`];
  for (const row of rows.slice(0, limit)) {
    lines.push(
      `${row.symbol.padEnd(SYMBOL_COLUMN_WIDTH)} float=${formatCount(row.float)}  exchange=${row.exchange ?? 'n/a'}  name=${row.shortName ?? 'n/a'}`
    );
  }
  return lines;
}
