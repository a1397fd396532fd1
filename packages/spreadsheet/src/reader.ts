import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import {
  REQUIRED_COLUMNS,
  type CellValue,
  type SpreadsheetRow,
  type SpreadsheetTable,
} from '@vies-batch/contracts';
import { errorMessage, SpreadsheetFormatError } from '@vies-batch/shared';

export interface ReadSpreadsheetOptions {
  /** Sheet to read; the first sheet when unset */
  sheet?: string;

  /**
   * Headers the sheet must carry
   * @default REQUIRED_COLUMNS
   */
  requiredColumns?: readonly string[];
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function isBlank(value: CellValue): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

function headerName(value: unknown, column: number): string {
  const text = value === null || value === undefined ? '' : String(value).trim();
  return text === '' ? `Column ${String(column + 1)}` : text;
}

async function loadSource(source: string | Uint8Array): Promise<Uint8Array> {
  if (typeof source !== 'string') return source;
  try {
    return await readFile(source);
  } catch (error) {
    throw new SpreadsheetFormatError(`Cannot read ${source}: ${errorMessage(error)}`, [], { path: source });
  }
}

/**
 * Import the first (or named) sheet of a workbook.
 *
 * The first row is the header row. Data rows with every cell empty are
 * skipped; the others keep their 1-based sheet row number. Cell values pass
 * through unmodified.
 *
 * @throws SpreadsheetFormatError when the file cannot be parsed, the sheet is
 * missing or required columns are absent
 */
export async function readSpreadsheet(
  source: string | Uint8Array,
  options: ReadSpreadsheetOptions = {},
): Promise<SpreadsheetTable> {
  const data = await loadSource(source);
  const context = typeof source === 'string' ? { path: source } : {};

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer' });
  } catch (error) {
    throw new SpreadsheetFormatError(`Not a readable spreadsheet: ${errorMessage(error)}`, [], context);
  }

  const sheetName = options.sheet ?? workbook.SheetNames[0];
  const worksheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (sheetName === undefined || worksheet === undefined) {
    throw new SpreadsheetFormatError(
      sheetName === undefined ? 'Workbook has no sheets' : `Sheet "${sheetName}" not found`,
      [],
      { ...context, sheets: workbook.SheetNames },
    );
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: true,
  });
  const [headerRow, ...dataRows] = grid;
  if (headerRow === undefined || headerRow.every((cell) => isBlank(toCellValue(cell)))) {
    throw new SpreadsheetFormatError('Spreadsheet has no header row', [], context);
  }

  const headers = headerRow.map(headerName);
  const required = options.requiredColumns ?? REQUIRED_COLUMNS;
  const missing = required.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new SpreadsheetFormatError(`Missing required columns: ${missing.join(', ')}`, missing, {
      ...context,
      headers,
    });
  }

  const firstRow = XLSX.utils.decode_range(worksheet['!ref'] ?? 'A1').s.r;
  const rows: SpreadsheetRow[] = [];
  dataRows.forEach((cells, index) => {
    const values: Record<string, CellValue> = {};
    headers.forEach((header, column) => {
      values[header] = toCellValue(cells[column]);
    });
    if (Object.values(values).every(isBlank)) return;
    // header is sheet row firstRow + 1
    rows.push({ rowNumber: firstRow + index + 2, values });
  });

  return { sheetName, headers, rows };
}
