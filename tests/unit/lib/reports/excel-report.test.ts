/**
 * Unit Tests for the Excel report
 * Workbooks are read back with SheetJS itself
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import * as XLSX from 'xlsx';
import {
  SUMMARY_SHEET,
  buildWorkbook,
  columnWidths,
  formatTimestamp,
  uniqueSheetName,
  writeWorkbook,
} from '../../../../backend/src/lib/reports/excel-report.js';
import { context, igwSummary, natSummary, sample } from './report-fixtures.js';

function rowsOf(workbook: XLSX.WorkBook, sheetName: string): unknown[][] {
  return XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], { header: 1, defval: null });
}

describe('formatTimestamp', () => {
  it('should render UTC without milliseconds or zone', () => {
    expect(formatTimestamp(new Date('2026-01-01T06:00:00.000Z'))).toBe('2026-01-01 06:00:00');
  });
});

describe('uniqueSheetName', () => {
  it('should strip characters Excel forbids', () => {
    expect(uniqueSheetName('web/edge:[1]?', new Set())).toBe('webedge1');
  });

  it('should fall back to a generic name when nothing is left', () => {
    expect(uniqueSheetName(' *? ', new Set())).toBe('Gateway');
  });

  it('should truncate to 31 characters', () => {
    const name = uniqueSheetName('a'.repeat(40), new Set());

    expect(name).toBe('a'.repeat(31));
  });

  it('should number duplicates case-insensitively', () => {
    const used = new Set<string>(['summary']);

    expect(uniqueSheetName('egress', used)).toBe('egress');
    expect(uniqueSheetName('EGRESS', used)).toBe('EGRESS (2)');
    expect(uniqueSheetName('egress', used)).toBe('egress (3)');
    expect(uniqueSheetName('Summary', used)).toBe('Summary (2)');
  });

  it('should keep numbered names within 31 characters', () => {
    const used = new Set<string>();
    uniqueSheetName('b'.repeat(40), used);

    expect(uniqueSheetName('b'.repeat(40), used)).toBe(`${'b'.repeat(27)} (2)`);
  });
});

describe('columnWidths', () => {
  it('should size each column to its longest cell plus padding', () => {
    expect(columnWidths([['ab', null], [12345, 'x']])).toEqual([{ wch: 7 }, { wch: 3 }]);
  });

  it('should cap wide columns', () => {
    expect(columnWidths([['x'.repeat(80)]])).toEqual([{ wch: 50 }]);
  });
});

describe('buildWorkbook', () => {
  const samples = [
    sample('nat-1', 'BytesInFromSource', '2026-02-25T00:00:00Z', 0),
    sample('igw-1', 'BytesInFromDestination', '2026-02-20T00:00:00Z', 0),
    sample('nat-1', 'BytesInFromSource', '2026-02-25T06:00:00Z', 100),
    sample('nat-gone', 'BytesInFromSource', '2026-02-25T06:00:00Z', 5),
  ];

  it('should put the summary sheet first and one sheet per gateway after it', () => {
    const workbook = buildWorkbook({ summaries: [natSummary, igwSummary], samples }, context);

    expect(workbook.SheetNames).toEqual([SUMMARY_SHEET, 'egress', 'IGW-main']);
  });

  it('should write one summary row per gateway with kind-specific columns left empty', () => {
    const workbook = buildWorkbook({ summaries: [natSummary, igwSummary], samples }, context);
    const rows = rowsOf(workbook, SUMMARY_SHEET);

    expect(rows).toHaveLength(3);
    expect(rows[0]).toHaveLength(28);
    expect(rows[0].slice(0, 7)).toEqual([
      'Account ID',
      'Region',
      'VPC ID',
      'VPC Name',
      'Gateway Type',
      'Gateway ID',
      'Gateway Name',
    ]);
    expect(rows[1]).toEqual([
      '111122223333', 'us-east-1', 'vpc-1', 'main', 'NAT', 'nat-1', 'egress',
      2, 1, 50, 1234567, 50, 3, 2,
      4, 1, 0, 7, 2.5,
      null, null, null, null, null,
      1234617, 5, 28.58, 0,
    ]);
    expect(rows[2]).toEqual([
      '111122223333', 'us-east-1', null, null, 'IGW', 'igw-1', 'IGW-main',
      1, 1, 100, 0, 0, 0, 0,
      null, null, null, null, null,
      0, 0, 0, 0, 'Inactive',
      0, 0, 0, 0,
    ]);
  });

  it('should list each gateway samples on its own sheet', () => {
    const workbook = buildWorkbook({ summaries: [natSummary, igwSummary], samples }, context);
    const rows = rowsOf(workbook, 'egress');

    expect(rows[0]).toEqual([
      'Account ID', 'Region', 'Gateway Type', 'Gateway ID', 'Gateway Name', 'VPC ID', 'VPC Name',
      'Metric', 'Timestamp', 'Sum', 'Average', 'Maximum', 'Minimum',
    ]);
    expect(rows.slice(1)).toEqual([
      ['111122223333', 'us-east-1', 'NAT', 'nat-1', 'egress', 'vpc-1', 'main', 'BytesInFromSource', '2026-02-25 00:00:00', 0, 0, 0, 0],
      ['111122223333', 'us-east-1', 'NAT', 'nat-1', 'egress', 'vpc-1', 'main', 'BytesInFromSource', '2026-02-25 06:00:00', 100, 100, 100, 100],
    ]);
    expect(rowsOf(workbook, 'IGW-main')).toHaveLength(2);
  });

  it('should size summary columns from their content', () => {
    const workbook = buildWorkbook({ summaries: [natSummary], samples: [] }, context);

    // "111122223333" is longer than its "Account ID" header
    expect(workbook.Sheets[SUMMARY_SHEET]['!cols']?.[0]).toEqual({ wch: 14 });
  });
});

describe('writeWorkbook', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should write an xlsx file that reads back with the same sheets', async () => {
    dir = await mkdtemp(join(tmpdir(), 'gateway-report-'));
    const path = join(dir, 'report.xlsx');

    await writeWorkbook(buildWorkbook({ summaries: [natSummary], samples: [] }, context), path);

    const workbook = XLSX.read(await readFile(path), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual([SUMMARY_SHEET, 'egress']);
    expect(rowsOf(workbook, SUMMARY_SHEET)[1][5]).toBe('nat-1');
  });
});
