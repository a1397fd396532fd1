/**
 * @vies-batch/spreadsheet
 *
 * Reads the input sheet and writes annotated results and request logs.
 * Every write goes through a temp file renamed into place.
 *
 * @packageDocumentation
 */

export { readSpreadsheet, type ReadSpreadsheetOptions } from './reader.js';
export {
  exportResults,
  buildExportGrid,
  bookTypeForPath,
  RESULT_COLUMNS,
  type ExportBookType,
  type ExportOptions,
  type ExportSummary,
  type ResultSource,
} from './exporter.js';
export { exportLog, type LogTextSource } from './log-export.js';
export { writeFileAtomic } from './atomic-write.js';
export { defaultResultsFileName, defaultLogFileName } from './file-names.js';
