import { isDefinitiveCode } from '@vies-batch/contracts';
import { FormatError, requireVatNumber, toVatQuery } from '@vies-batch/shared';
import { LoggerLogSink } from '@vies-batch/vies-client';
import { formatCheckResult } from '../format.js';
import type { CommandContext } from './context.js';

export interface CheckCommandOptions {
  vat: string;
  dryRun: boolean;
}

/**
 * Validate one VAT number and print the answer.
 *
 * @returns 0 when VIES answered VALID or INVALID, 1 otherwise
 */
export async function runCheck(options: CheckCommandOptions, ctx: CommandContext): Promise<number> {
  const { colors, output } = ctx;

  try {
    requireVatNumber(options.vat);
  } catch (error) {
    if (error instanceof FormatError) {
      output.err(`${colors.red('Error:')} ${error.message}`);
      return 1;
    }
    throw error;
  }

  const handle = ctx.openClient({ dryRun: options.dryRun, logSink: new LoggerLogSink(ctx.logger) });
  try {
    const result = await handle.client.validate(toVatQuery(options.vat, 0));
    for (const line of formatCheckResult(result, colors)) {
      output.out(line);
    }
    return isDefinitiveCode(result.errorCode) ? 0 : 1;
  } finally {
    await handle.close();
  }
}
