import { fullVatNumber, type ViesErrorCode, type VatResult } from '@vies-batch/contracts';
import type { BatchJob } from '../job/batch-job.js';

/**
 * Counts over the results of a batch.
 */
export interface BatchSummary {
  total: number;
  /** Rows with a result */
  attempted: number;
  /** Rows never dispatched before a cancellation */
  notAttempted: number;
  valid: number;
  invalid: number;
  /** Rows whose validity stayed unknown (bad input or service failure) */
  failed: number;
  byErrorCode: Partial<Record<ViesErrorCode, number>>;
  /** Results answered from the result cache */
  cached: number;
}

export function summarizeBatch(job: BatchJob): BatchSummary {
  const summary: BatchSummary = {
    total: job.totalCount,
    attempted: job.completedCount,
    notAttempted: job.totalCount - job.completedCount,
    valid: 0,
    invalid: 0,
    failed: 0,
    byErrorCode: {},
    cached: 0,
  };

  for (const result of job.results.values()) {
    if (result.isValid === true) summary.valid++;
    else if (result.isValid === false) summary.invalid++;
    else summary.failed++;

    summary.byErrorCode[result.errorCode] = (summary.byErrorCode[result.errorCode] ?? 0) + 1;
    if (result.fromCache) summary.cached++;
  }

  return summary;
}

/**
 * Results whose VAT number, company name, address or error code contains
 * `text` (case-insensitive), in row order. Blank text matches every result.
 */
export function searchResults(job: BatchJob, text: string): VatResult[] {
  const needle = text.trim().toLowerCase();
  const ordered = job.orderedResults();
  if (needle === '') return ordered;

  return ordered.filter((result) =>
    [
      result.query.raw,
      result.query.countryCode !== null ? fullVatNumber(result.query) : result.query.number,
      result.companyName,
      result.companyAddress,
      result.errorCode,
    ].some((field) => field !== undefined && field.toLowerCase().includes(needle)),
  );
}
