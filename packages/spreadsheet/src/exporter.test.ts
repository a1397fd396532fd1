import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import type { SpreadsheetTable, VatResult } from '@vies-batch/contracts';
import { createVatResult, toVatQuery, WriteError } from '@vies-batch/shared';
import { BatchOrchestrator } from '@vies-batch/batch';
import { MockViesClient } from '@vies-batch/vies-client';
import { bookTypeForPath, buildExportGrid, exportResults } from './exporter.js';

const table: SpreadsheetTable = {
  sheetName: 'Invoices',
  headers: ['NIF Contraparte', 'Importe', 'Tipo', 'Name'],
  rows: [
    { rowNumber: 2, values: { 'NIF Contraparte': 'IT05159640266', Importe: 100, Tipo: 'E', Name: 'Old' } },
    { rowNumber: 3, values: { 'NIF Contraparte': 'DE123456789', Importe: 50, Tipo: 'S', Name: null } },
    { rowNumber: 4, values: { 'NIF Contraparte': 'ZZ1', Importe: 25, Tipo: 'E', Name: null } },
  ],
};

function result(raw: string, index: number, fields: Partial<VatResult> & Pick<VatResult, 'errorCode'>): VatResult {
  return createVatResult(toVatQuery(raw, index), {
    isValid: fields.isValid ?? null,
    errorCode: fields.errorCode,
    companyName: fields.companyName,
    companyAddress: fields.companyAddress,
    requestTimestamp: '2024-03-01T10:00:00.000Z',
    attempts: 1,
  });
}

// Inserted in completion order, not row order
const results = new Map<number, VatResult>([
  [2, result('ZZ1', 2, { errorCode: 'INVALID_INPUT' })],
  [0, result('IT05159640266', 0, { errorCode: 'VALID', isValid: true, companyName: 'ACME', companyAddress: 'Via Roma 1' })],
  [1, result('DE123456789', 1, { errorCode: 'INVALID', isValid: false })],
]);

async function readGrid(file: string): Promise<unknown[][]> {
  const workbook = XLSX.read(await readFile(file), { type: 'buffer' });
  const sheetName = workbook.SheetNames[0] ?? '';
  return XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName] ?? {}, { header: 1, defval: null, raw: true });
}

describe('buildExportGrid', () => {
  it('should append result columns in input row order', () => {
    expect(buildExportGrid({ results }, table)).toEqual([
      ['NIF Contraparte', 'Importe', 'Tipo', 'Name', 'IS_Valid', 'Company Name', 'Company Address', 'Error Code'],
      ['IT05159640266', 100, 'E', 'ACME', 'True', 'ACME', 'Via Roma 1', 'VALID'],
      ['DE123456789', 50, 'S', null, 'False', null, null, 'INVALID'],
      ['ZZ1', 25, 'E', null, null, null, null, 'INVALID_INPUT'],
    ]);
  });

  it('should leave result cells empty for rows never attempted', () => {
    const partial = new Map([[0, results.get(0) ?? result('IT05159640266', 0, { errorCode: 'UNKNOWN' })]]);
    const grid = buildExportGrid({ results: partial }, table);

    expect(grid[2]).toEqual(['DE123456789', 50, 'S', null, null, null, null, null]);
  });

  it('should clear the Name of a checked row that came back without a company', () => {
    const named: SpreadsheetTable = {
      ...table,
      rows: [{ rowNumber: 2, values: { 'NIF Contraparte': 'DE123456789', Importe: 1, Tipo: 'E', Name: 'Stale Corp' } }],
    };
    const invalid = new Map([[0, result('DE123456789', 0, { errorCode: 'INVALID', isValid: false })]]);

    expect(buildExportGrid({ results: invalid }, named)[1]).toEqual(
      ['DE123456789', 1, 'E', null, 'False', null, null, 'INVALID'],
    );
  });

  it('should keep the input Name of a row never attempted', () => {
    const grid = buildExportGrid({ results: new Map() }, table);

    expect(grid[1]).toEqual(['IT05159640266', 100, 'E', 'Old', null, null, null, null]);
  });

  it('should not duplicate result columns of a re-imported export', () => {
    const reimported: SpreadsheetTable = {
      sheetName: 'Results',
      headers: ['NIF Contraparte', 'IS_Valid', 'Error Code'],
      rows: [{ rowNumber: 2, values: { 'NIF Contraparte': 'IT05159640266', IS_Valid: 'False', 'Error Code': 'INVALID' } }],
    };

    expect(buildExportGrid({ results }, reimported)[0]).toEqual([
      'NIF Contraparte',
      'IS_Valid',
      'Company Name',
      'Company Address',
      'Error Code',
    ]);
  });
});

describe('bookTypeForPath', () => {
  it('should follow the extension and default to xlsx', () => {
    expect(bookTypeForPath('out.XLS')).toBe('xls');
    expect(bookTypeForPath('out.ods')).toBe('ods');
    expect(bookTypeForPath('out.csv')).toBe('csv');
    expect(bookTypeForPath('out')).toBe('xlsx');
  });
});

describe('exportResults', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vies-batch-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write an xlsx workbook that reads back in row order', async () => {
    const file = join(dir, 'results.xlsx');
    const summary = await exportResults({ results }, table, file);

    expect(summary).toMatchObject({ path: file, bookType: 'xlsx', rows: 3, annotated: 3 });
    const grid = await readGrid(file);
    expect(grid.map((row) => row[0])).toEqual(['NIF Contraparte', 'IT05159640266', 'DE123456789', 'ZZ1']);
    expect(grid[1]).toEqual(['IT05159640266', 100, 'E', 'ACME', 'True', 'ACME', 'Via Roma 1', 'VALID']);
  });

  it('should write csv by extension', async () => {
    const file = join(dir, 'results.csv');
    await exportResults({ results }, table, file);

    const lines = (await readFile(file, 'utf8'))
      .replace(/^\uFEFF/, '')
      .split(/\r?\n/)
      .filter((line) => line !== '');
    expect(lines[0]).toBe('NIF Contraparte,Importe,Tipo,Name,IS_Valid,Company Name,Company Address,Error Code');
    expect(lines[1]).toBe('IT05159640266,100,E,ACME,True,ACME,Via Roma 1,VALID');
  });

  it('should overwrite cleanly when exporting twice to one path', async () => {
    const file = join(dir, 'results.xlsx');
    await exportResults({ results: new Map() }, table, file);
    await exportResults({ results }, table, file);

    expect(await readdir(dir)).toEqual(['results.xlsx']);
    expect((await readGrid(file))[3]).toEqual(['ZZ1', 25, 'E', null, null, null, null, 'INVALID_INPUT']);
  });

  it('should keep input order for any completion order of a real batch', async () => {
    const job = await new BatchOrchestrator({ client: new MockViesClient({ latencyMs: 1 }), concurrency: 3 }).run(
      table.rows,
    );
    const file = join(dir, 'batch.xlsx');
    await exportResults(job, table, file);

    const grid = await readGrid(file);
    expect(grid.slice(1).map((row) => [row[0], row[7]])).toEqual([
      ['IT05159640266', 'VALID'],
      ['DE123456789', 'INVALID'],
      ['ZZ1', 'INVALID_INPUT'],
    ]);
  });

  it('should raise WriteError and leave no temp file when the target is not writable', async () => {
    const blocked = join(dir, 'results.xlsx');
    await mkdir(blocked);

    await expect(exportResults({ results }, table, blocked)).rejects.toBeInstanceOf(WriteError);
    expect(await readdir(dir)).toEqual(['results.xlsx']);
  });

  it('should raise WriteError for a missing directory', async () => {
    await expect(exportResults({ results }, table, join(dir, 'missing', 'results.xlsx'))).rejects.toMatchObject({
      name: 'WriteError',
      code: 'WRITE_ERROR',
    });
  });
});
