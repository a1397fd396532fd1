import path from 'node:path';
import { REQUIRED_COLUMNS, VAT_COLUMN, type SpreadsheetTable } from '@vies-batch/contracts';
import {
  BatchOrchestrator,
  CompositeEventHooks,
  ConsoleEventHooks,
  searchResults,
  summarizeBatch,
  type BatchEventHooks,
} from '@vies-batch/batch';
import { SpreadsheetFormatError, WriteError } from '@vies-batch/shared';
import {
  defaultResultsFileName,
  exportLog,
  exportResults,
  readSpreadsheet,
} from '@vies-batch/spreadsheet';
import { CompositeLogSink, LoggerLogSink, MemoryLogSink } from '@vies-batch/vies-client';
import { formatMatch, formatProgress, formatSummary } from '../format.js';
import type { CommandContext } from './context.js';

export interface BatchCommandOptions {
  input: string;
  /** Defaults to `vat_results_<timestamp>.xlsx` in the working directory */
  output?: string | undefined;
  sheet?: string | undefined;
  vatColumn?: string | undefined;
  /** Also save the live request log here */
  logFile?: string | undefined;
  /** Print the results containing this text after the summary */
  filter?: string | undefined;
  dryRun: boolean;
  /** Aborting cancels the batch; partial results are still exported */
  signal?: AbortSignal | undefined;
}

async function importTable(options: BatchCommandOptions, vatColumn: string, ctx: CommandContext) {
  const requiredColumns = REQUIRED_COLUMNS.map((column) => (column === VAT_COLUMN ? vatColumn : column));
  try {
    return await readSpreadsheet(
      options.input,
      options.sheet !== undefined ? { sheet: options.sheet, requiredColumns } : { requiredColumns },
    );
  } catch (error) {
    if (error instanceof SpreadsheetFormatError) {
      ctx.output.err(`${ctx.colors.red('Error:')} ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

/**
 * Import a sheet, validate every row, print a summary and export the
 * annotated rows.
 *
 * @returns 0 when every row was validated and every file written, 1 otherwise
 */
export async function runBatch(options: BatchCommandOptions, ctx: CommandContext): Promise<number> {
  const { colors, output, config } = ctx;
  const vatColumn = options.vatColumn ?? VAT_COLUMN;

  const table: SpreadsheetTable | undefined = await importTable(options, vatColumn, ctx);
  if (table === undefined) return 1;
  output.out(`Imported ${String(table.rows.length)} rows from ${path.basename(options.input)} (${table.sheetName})`);

  const liveLog = new MemoryLogSink();
  const logSink = new CompositeLogSink([liveLog, new LoggerLogSink(ctx.logger)]);
  const progress: BatchEventHooks = {
    onProgress: (event) => {
      output.out(formatProgress(event, colors));
    },
  };
  const hooks: BatchEventHooks =
    config.logLevel === 'debug' ? new CompositeEventHooks([progress, new ConsoleEventHooks()]) : progress;

  const handle = ctx.openClient({ dryRun: options.dryRun, logSink });
  let exitCode = 0;
  try {
    const orchestrator = new BatchOrchestrator({
      client: handle.client,
      concurrency: config.concurrency,
      vatColumn,
      batchTimeoutMs: config.batchTimeoutMs,
      hooks,
      logSink,
      logger: ctx.logger,
      clock: ctx.clock,
    });
    const job = await orchestrator.run(table.rows, options.signal !== undefined ? { signal: options.signal } : {});

    if (job.status === 'CANCELLED') {
      exitCode = 1;
      output.err(
        colors.yellow(
          `Batch cancelled (${job.cancelReason ?? 'requested'}): ` +
            `${String(job.completedCount)} of ${String(job.totalCount)} rows validated`,
        ),
      );
    }
    for (const line of formatSummary(summarizeBatch(job), colors)) {
      output.out(line);
    }
    if (options.filter !== undefined) {
      const matches = searchResults(job, options.filter);
      output.out(`Matches for "${options.filter}": ${String(matches.length)} of ${String(job.totalCount)} rows`);
      for (const result of matches) {
        const row = table.rows[result.query.sourceRowIndex];
        output.out(formatMatch(result, row?.rowNumber ?? result.query.sourceRowIndex + 2, colors));
      }
    }

    const target = options.output ?? defaultResultsFileName(ctx.clock.now());
    try {
      const summary = await exportResults(job, table, target, { logger: ctx.logger });
      output.out(`Results written to ${summary.path}`);
    } catch (error) {
      if (!(error instanceof WriteError)) throw error;
      exitCode = 1;
      output.err(`${colors.red('Error:')} ${error.message}`);
    }

    if (options.logFile !== undefined) {
      try {
        output.out(`Request log written to ${await exportLog(liveLog, options.logFile)}`);
      } catch (error) {
        if (!(error instanceof WriteError)) throw error;
        exitCode = 1;
        output.err(`${colors.red('Error:')} ${error.message}`);
      }
    }
  } finally {
    await handle.close();
  }

  return exitCode;
}
