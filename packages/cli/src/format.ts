import type { ChalkInstance } from 'chalk';
import { fullVatNumber, VIES_ERROR_CODES, type VatQuery, type VatResult } from '@vies-batch/contracts';
import type { BatchProgressEvent, BatchSummary } from '@vies-batch/batch';
import { getCountryName } from '@vies-batch/shared';

export function displayVat(query: VatQuery): string {
  if (query.countryCode !== null) return fullVatNumber(query);
  const raw = query.raw.trim();
  return raw === '' ? '(empty)' : raw;
}

export function formatStatus(result: VatResult, colors: ChalkInstance): string {
  const cached = result.fromCache ? colors.dim(' (cached)') : '';
  switch (result.errorCode) {
    case 'VALID':
      return colors.green('VALID') + cached;
    case 'INVALID':
      return colors.red('INVALID') + cached;
    default:
      return colors.yellow(result.errorCode);
  }
}

/**
 * Detailed output of a single lookup.
 */
export function formatCheckResult(result: VatResult, colors: ChalkInstance): string[] {
  const label = (name: string): string => colors.dim(`${name}:`.padEnd(12));
  const { countryCode } = result.query;
  const country = countryCode !== null ? getCountryName(countryCode) : undefined;

  const lines = [
    `${label('VAT number')}${displayVat(result.query)}${country !== undefined ? ` (${country})` : ''}`,
    `${label('Status')}${formatStatus(result, colors)}`,
  ];
  if (result.companyName !== undefined) lines.push(`${label('Name')}${result.companyName}`);
  if (result.companyAddress !== undefined) lines.push(`${label('Address')}${result.companyAddress}`);
  if (result.requestDate !== undefined) lines.push(`${label('Checked')}${result.requestDate}`);
  if (result.message !== undefined) lines.push(`${label('Note')}${result.message}`);
  return lines;
}

/**
 * One line per completed row: `[ 3/12] IT05159640266 VALID ACME`.
 */
export function formatProgress(event: BatchProgressEvent, colors: ChalkInstance): string {
  const width = String(event.total).length;
  const counter = `[${String(event.completed).padStart(width)}/${String(event.total)}]`;
  const name = event.result.companyName !== undefined ? ` ${event.result.companyName}` : '';
  return `${colors.dim(counter)} ${displayVat(event.result.query)} ${formatStatus(event.result, colors)}${name}`;
}

/**
 * One row of a filtered listing: `  row 2  IT05159640266 VALID ACME`.
 */
export function formatMatch(result: VatResult, rowNumber: number, colors: ChalkInstance): string {
  const name = result.companyName !== undefined ? ` ${result.companyName}` : '';
  return `  row ${String(rowNumber)}  ${displayVat(result.query)} ${formatStatus(result, colors)}${name}`;
}

export function formatSummary(summary: BatchSummary, colors: ChalkInstance): string[] {
  const lines = [
    `${colors.bold('Summary')}: ${String(summary.total)} rows, ` +
      `${colors.green(`${String(summary.valid)} valid`)}, ` +
      `${colors.red(`${String(summary.invalid)} invalid`)}, ` +
      `${colors.yellow(`${String(summary.failed)} failed`)}, ` +
      `${String(summary.notAttempted)} not attempted`,
  ];
  if (summary.cached > 0) {
    lines.push(`  ${String(summary.cached)} answered from cache`);
  }
  for (const code of VIES_ERROR_CODES) {
    const count = summary.byErrorCode[code];
    if (code !== 'VALID' && code !== 'INVALID' && count !== undefined) {
      lines.push(`  ${code}: ${String(count)}`);
    }
  }
  return lines;
}
