import { fileTimestamp } from '@vies-batch/shared';

/**
 * `vat_results_20240105_090307.xlsx`
 */
export function defaultResultsFileName(date: Date = new Date()): string {
  return `vat_results_${fileTimestamp(date)}.xlsx`;
}

/**
 * `vat_request_log_20240105_090307.txt`
 */
export function defaultLogFileName(date: Date = new Date()): string {
  return `vat_request_log_${fileTimestamp(date)}.txt`;
}
