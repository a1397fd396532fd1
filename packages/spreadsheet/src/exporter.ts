import path from 'node:path';
import * as XLSX from 'xlsx';
import { NAME_COLUMN, type CellValue, type SpreadsheetTable, type VatResult } from '@vies-batch/contracts';
import { errorMessage, noopLogger, WriteError, type Logger } from '@vies-batch/shared';
import { writeFileAtomic } from './atomic-write.js';

/**
 * Columns appended to every exported row.
 */
export const RESULT_COLUMNS = ['IS_Valid', 'Company Name', 'Company Address', 'Error Code'] as const;

export type ExportBookType = 'xlsx' | 'xls' | 'ods' | 'csv';

const BOOK_TYPES: Readonly<Record<string, ExportBookType>> = {
  '.xlsx': 'xlsx',
  '.xls': 'xls',
  '.ods': 'ods',
  '.csv': 'csv',
};

/**
 * Anything holding results keyed by source row index, such as a BatchJob.
 */
export interface ResultSource {
  readonly results: ReadonlyMap<number, VatResult>;
}

export interface ExportOptions {
  /** Defaults to the extension of the path, then xlsx */
  bookType?: ExportBookType;
  /** Defaults to the imported sheet name */
  sheetName?: string;
  logger?: Logger;
}

export interface ExportSummary {
  path: string;
  bookType: ExportBookType;
  rows: number;
  /** Rows that had a result */
  annotated: number;
  headers: string[];
}

export function bookTypeForPath(filePath: string): ExportBookType {
  return BOOK_TYPES[path.extname(filePath).toLowerCase()] ?? 'xlsx';
}

function renderValidity(isValid: boolean | null): CellValue {
  if (isValid === null) return null;
  return isValid ? 'True' : 'False';
}

/**
 * Rows of the export: the header, then each input row in order with the
 * result columns appended.
 */
export function buildExportGrid(source: ResultSource, table: SpreadsheetTable): CellValue[][] {
  const appended: readonly string[] = RESULT_COLUMNS;
  const headers = [...table.headers.filter((header) => !appended.includes(header)), ...RESULT_COLUMNS];
  const originalHeaders = headers.slice(0, headers.length - RESULT_COLUMNS.length);

  const grid: CellValue[][] = [headers];
  table.rows.forEach((row, index) => {
    const result = source.results.get(index);
    const cells = originalHeaders.map((header): CellValue => {
      if (header === NAME_COLUMN && result !== undefined) {
        return result.companyName ?? null;
      }
      return row.values[header] ?? null;
    });

    if (result === undefined) {
      cells.push(null, null, null, null);
    } else {
      cells.push(
        renderValidity(result.isValid),
        result.companyName ?? null,
        result.companyAddress ?? null,
        result.errorCode,
      );
    }
    grid.push(cells);
  });
  return grid;
}

/**
 * Write the imported rows with their validation results to `filePath`.
 *
 * Rows keep the input order whatever order the results completed in. Rows
 * that were never attempted get empty result cells. The file is replaced
 * atomically, so exporting again to the same path is safe.
 *
 * @throws WriteError when the workbook cannot be serialized or written
 */
export async function exportResults(
  source: ResultSource,
  table: SpreadsheetTable,
  filePath: string,
  options: ExportOptions = {},
): Promise<ExportSummary> {
  const logger = options.logger ?? noopLogger;
  const target = path.resolve(filePath);
  const bookType = options.bookType ?? bookTypeForPath(target);
  const grid = buildExportGrid(source, table);

  let data: unknown;
  try {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(grid), options.sheetName ?? table.sheetName);
    data = XLSX.write(workbook, { bookType, type: 'buffer' });
  } catch (error) {
    throw new WriteError(`Cannot serialize workbook: ${errorMessage(error)}`, target, { cause: error });
  }
  if (!(data instanceof Uint8Array)) {
    throw new WriteError('Workbook serialization returned no data', target);
  }

  await writeFileAtomic(target, data, logger);

  const summary: ExportSummary = {
    path: target,
    bookType,
    rows: table.rows.length,
    annotated: table.rows.filter((_, index) => source.results.has(index)).length,
    headers: grid[0]?.map(String) ?? [],
  };
  logger.info('Results exported', { path: target, bookType, rows: summary.rows, annotated: summary.annotated });
  return summary;
}
