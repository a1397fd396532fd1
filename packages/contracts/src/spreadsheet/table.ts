/**
 * Value of a single spreadsheet cell.
 */
export type CellValue = string | number | boolean | null;

/**
 * One data row of an imported sheet.
 */
export interface SpreadsheetRow {
  /** 1-based row number in the sheet (the header is row 1) */
  readonly rowNumber: number;

  /** Cell values keyed by header name */
  readonly values: Readonly<Record<string, CellValue>>;
}

/**
 * An imported sheet with its header row.
 */
export interface SpreadsheetTable {
  readonly sheetName: string;
  readonly headers: readonly string[];
  readonly rows: readonly SpreadsheetRow[];
}

/**
 * Column holding the VAT number.
 */
export const VAT_COLUMN = 'NIF Contraparte';

/**
 * Columns an input sheet must carry.
 */
export const REQUIRED_COLUMNS = ['NIF Contraparte', 'Importe', 'Tipo'] as const;

/**
 * Optional column overwritten with the company name on export.
 */
export const NAME_COLUMN = 'Name';
