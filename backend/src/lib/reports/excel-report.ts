/**
 * Excel report for a gateway analysis run
 *
 * - "Summary" sheet: one row per analyzed gateway
 * - one sheet per gateway with every collected sample
 */

import { writeFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import type { AnalysisResult, AnalysisSummary, MetricSample } from '../../types/gateway.js';
import { groupSamplesByGateway } from '../gateway-analysis/idle-aggregator.js';

export interface ReportContext {
  accountId: string;
  region: string;
}

type CellValue = string | number | null;

interface Column<T> {
  header: string;
  value: (row: T, context: ReportContext) => CellValue;
}

export const SUMMARY_SHEET = 'Summary';
const MAX_SHEET_NAME = 31;
const MAX_COLUMN_WIDTH = 50;

const SUMMARY_COLUMNS: Column<AnalysisSummary>[] = [
  { header: 'Account ID', value: (_, ctx) => ctx.accountId },
  { header: 'Region', value: (_, ctx) => ctx.region },
  { header: 'VPC ID', value: s => s.networkId },
  { header: 'VPC Name', value: s => s.networkName },
  { header: 'Gateway Type', value: s => s.kind },
  { header: 'Gateway ID', value: s => s.gatewayId },
  { header: 'Gateway Name', value: s => s.displayName },
  { header: 'Total Periods', value: s => s.totalPeriods },
  { header: 'Idle Periods', value: s => s.idlePeriods },
  { header: 'Idle Percentage', value: s => s.idlePercentage },
  { header: 'Total Bytes In', value: s => s.bytesIn },
  { header: 'Total Bytes Out', value: s => s.bytesOut },
  { header: 'Total Packets In', value: s => s.packetsIn },
  { header: 'Total Packets Out', value: s => s.packetsOut },
  { header: 'Connection Attempts', value: s => (s.kind === 'NAT' ? s.connectionAttempts : null) },
  { header: 'Connection Timeouts', value: s => (s.kind === 'NAT' ? s.connectionTimeouts : null) },
  { header: 'Port Allocation Errors', value: s => (s.kind === 'NAT' ? s.portAllocationErrors : null) },
  { header: 'Max Active Connections', value: s => (s.kind === 'NAT' ? s.maxActiveConnections : null) },
  { header: 'Avg Active Connections', value: s => (s.kind === 'NAT' ? s.avgActiveConnections : null) },
  { header: 'Blackhole Drops (Bytes)', value: s => (s.kind === 'IGW' ? s.blackholeDropBytes : null) },
  { header: 'No Route Drops (Bytes)', value: s => (s.kind === 'IGW' ? s.noRouteDropBytes : null) },
  { header: 'Blackhole Drops (Packets)', value: s => (s.kind === 'IGW' ? s.blackholeDropPackets : null) },
  { header: 'No Route Drops (Packets)', value: s => (s.kind === 'IGW' ? s.noRouteDropPackets : null) },
  { header: 'Status', value: s => (s.kind === 'IGW' ? s.status : null) },
  { header: 'Total Bytes', value: s => s.totalBytes },
  { header: 'Total Packets', value: s => s.totalPackets },
  { header: 'Bytes Per Second Avg', value: s => s.bytesPerSecondAvg },
  { header: 'Packets Per Second Avg', value: s => s.packetsPerSecondAvg },
];

interface DetailRow {
  summary: AnalysisSummary;
  sample: MetricSample;
}

const DETAIL_COLUMNS: Column<DetailRow>[] = [
  { header: 'Account ID', value: (_, ctx) => ctx.accountId },
  { header: 'Region', value: (_, ctx) => ctx.region },
  { header: 'Gateway Type', value: r => r.summary.kind },
  { header: 'Gateway ID', value: r => r.summary.gatewayId },
  { header: 'Gateway Name', value: r => r.summary.displayName },
  { header: 'VPC ID', value: r => r.summary.networkId },
  { header: 'VPC Name', value: r => r.summary.networkName },
  { header: 'Metric', value: r => r.sample.metricName },
  { header: 'Timestamp', value: r => formatTimestamp(r.sample.timestamp) },
  { header: 'Sum', value: r => r.sample.sum },
  { header: 'Average', value: r => r.sample.average },
  { header: 'Maximum', value: r => r.sample.maximum },
  { header: 'Minimum', value: r => r.sample.minimum },
];

/** UTC, without zone designator: "2026-01-01 06:00:00" */
export function formatTimestamp(timestamp: Date): string {
  return timestamp.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '');
}

/**
 * Excel sheet names: at most 31 characters, none of []:*?/\ and unique
 * (case-insensitively) within the workbook.
 */
export function uniqueSheetName(name: string, used: Set<string>): string {
  const cleaned = name.replace(/[[\]:*?\/\\]/g, '').trim() || 'Gateway';
  let candidate = cleaned.slice(0, MAX_SHEET_NAME);
  let counter = 2;

  while (used.has(candidate.toLowerCase())) {
    const suffix = ` (${counter})`;
    candidate = `${cleaned.slice(0, MAX_SHEET_NAME - suffix.length)}${suffix}`;
    counter++;
  }

  used.add(candidate.toLowerCase());
  return candidate;
}

export function columnWidths(rows: CellValue[][]): XLSX.ColInfo[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, idx) => {
      const length = cell === null ? 0 : String(cell).length;
      widths[idx] = Math.max(widths[idx] ?? 0, length);
    });
  }
  return widths.map(width => ({ wch: Math.min(width + 2, MAX_COLUMN_WIDTH) }));
}

function toSheet<T>(columns: Column<T>[], rows: T[], context: ReportContext): XLSX.WorkSheet {
  const table: CellValue[][] = [
    columns.map(c => c.header),
    ...rows.map(row => columns.map(c => c.value(row, context))),
  ];
  const sheet = XLSX.utils.aoa_to_sheet(table);
  sheet['!cols'] = columnWidths(table);
  return sheet;
}

export function buildWorkbook(result: Pick<AnalysisResult, 'summaries' | 'samples'>, context: ReportContext): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const used = new Set<string>([SUMMARY_SHEET.toLowerCase()]);

  XLSX.utils.book_append_sheet(workbook, toSheet(SUMMARY_COLUMNS, result.summaries, context), SUMMARY_SHEET);

  const samplesByGateway = groupSamplesByGateway(result.samples);
  for (const summary of result.summaries) {
    const samples = samplesByGateway.get(summary.gatewayId) ?? [];
    const rows = samples.map(sample => ({ summary, sample }));
    const sheetName = uniqueSheetName(summary.displayName, used);
    XLSX.utils.book_append_sheet(workbook, toSheet(DETAIL_COLUMNS, rows, context), sheetName);
  }

  return workbook;
}

export async function writeWorkbook(workbook: XLSX.WorkBook, outputPath: string): Promise<void> {
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  await writeFile(outputPath, buffer);
}
