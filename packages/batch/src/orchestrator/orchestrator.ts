import {
  VAT_COLUMN,
  type CancelReason,
  type CellValue,
  type LiveLogEntry,
  type LogSink,
  type SpreadsheetRow,
  type VatQuery,
  type VatResult,
  type ViesClient,
} from '@vies-batch/contracts';
import {
  ConfigurationError,
  createVatResult,
  defaultClock,
  defaultIdGenerator,
  errorMessage,
  invalidInputResult,
  noopLogger,
  toVatQuery,
  type Clock,
  type IdGenerator,
  type Logger,
} from '@vies-batch/shared';
import { NoopEventHooks, type BatchCompleteEvent, type BatchEventHooks } from '../events/hooks.js';
import { BatchJob } from '../job/batch-job.js';
import { ProgressChannel } from './progress-channel.js';

export const DEFAULT_CONCURRENCY = 5;
export const MAX_CONCURRENCY = 50;

/**
 * Configuration for {@link BatchOrchestrator}
 */
export interface BatchOrchestratorConfig {
  client: ViesClient;

  /**
   * Number of workers
   * @default 5
   */
  concurrency?: number;

  /**
   * Header of the column holding the VAT number
   * @default 'NIF Contraparte'
   */
  vatColumn?: string;

  /**
   * Wall-clock limit for a whole batch; 0 disables it
   * @default 0
   */
  batchTimeoutMs?: number;

  hooks?: BatchEventHooks;
  logSink?: LogSink;
  logger?: Logger;
  clock?: Clock;
  idGenerator?: IdGenerator;
}

export interface BatchRunOptions {
  /** Aborting the signal cancels the batch */
  signal?: AbortSignal;

  /** Overrides the configured batch timeout for this run */
  batchTimeoutMs?: number;
}

/**
 * Handle on a started batch.
 */
export interface BatchRun {
  readonly job: BatchJob;

  /**
   * Stop dispatching. Requests already in flight still complete.
   */
  cancel(reason?: CancelReason): void;

  /**
   * Resolves with the job once it is DONE or CANCELLED.
   */
  readonly done: Promise<BatchJob>;
}

/**
 * State shared by the workers of one run.
 */
interface WorkerContext {
  readonly job: BatchJob;
  readonly logSink: LogSink;
  readonly channel: ProgressChannel;
  /** Position of the next query to dispatch */
  next: number;
  cancelReason: CancelReason | undefined;
}

function cellText(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Build one query per row, indexed by the row's position.
 */
export function queriesFromRows(rows: readonly SpreadsheetRow[], vatColumn: string = VAT_COLUMN): VatQuery[] {
  return rows.map((row, index) => toVatQuery(cellText(row.values[vatColumn]), index));
}

/**
 * BatchOrchestrator validates the rows of a sheet through a bounded pool of
 * workers sharing one ViesClient.
 *
 * Rows whose VAT number does not format get an INVALID_INPUT result at their
 * turn and never reach the client. A failing row never stops the others.
 *
 * @example
 * ```typescript
 * const orchestrator = new BatchOrchestrator({ client, concurrency: 5 });
 * const run = orchestrator.start(table.rows);
 * process.once('SIGINT', () => run.cancel());
 * const job = await run.done;
 * ```
 */
export class BatchOrchestrator {
  private readonly client: ViesClient;
  private readonly concurrency: number;
  private readonly vatColumn: string;
  private readonly batchTimeoutMs: number;
  private readonly hooks: BatchEventHooks;
  private readonly logSink: LogSink | undefined;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly idGenerator: IdGenerator;

  constructor(config: BatchOrchestratorConfig) {
    const concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      throw new ConfigurationError(`Concurrency must be an integer between 1 and ${String(MAX_CONCURRENCY)}`, {
        concurrency,
      });
    }
    const batchTimeoutMs = config.batchTimeoutMs ?? 0;
    if (batchTimeoutMs < 0) {
      throw new ConfigurationError('Batch timeout must not be negative', { batchTimeoutMs });
    }

    this.client = config.client;
    this.concurrency = concurrency;
    this.vatColumn = config.vatColumn ?? VAT_COLUMN;
    this.batchTimeoutMs = batchTimeoutMs;
    this.hooks = config.hooks ?? new NoopEventHooks();
    this.logSink = config.logSink;
    this.logger = config.logger ?? noopLogger;
    this.clock = config.clock ?? defaultClock;
    this.idGenerator = config.idGenerator ?? defaultIdGenerator;
  }

  /**
   * Create a PENDING job for the rows.
   */
  createJob(rows: readonly SpreadsheetRow[]): BatchJob {
    return new BatchJob({
      queries: queriesFromRows(rows, this.vatColumn),
      clock: this.clock,
      idGenerator: this.idGenerator,
    });
  }

  /**
   * Validate every row and resolve with the finished job.
   */
  async run(rows: readonly SpreadsheetRow[], options: BatchRunOptions = {}): Promise<BatchJob> {
    return this.start(rows, options).done;
  }

  /**
   * Start a batch and return a handle to cancel it or await it.
   */
  start(rows: readonly SpreadsheetRow[], options: BatchRunOptions = {}): BatchRun {
    const job = this.createJob(rows);
    const context: WorkerContext = {
      job,
      logSink: this.logSink ?? { write: () => undefined },
      channel: new ProgressChannel(this.logger),
      next: 0,
      cancelReason: undefined,
    };

    return {
      job,
      cancel: (reason: CancelReason = 'requested') => {
        this.requestCancel(context, reason);
      },
      done: this.execute(context, options),
    };
  }

  private async execute(context: WorkerContext, options: BatchRunOptions): Promise<BatchJob> {
    const { job, channel } = context;
    const log = this.logger.child({ batchId: job.id });
    job.start();

    const timeoutMs = options.batchTimeoutMs ?? this.batchTimeoutMs;
    const timeoutId =
      timeoutMs > 0
        ? setTimeout(() => {
            this.requestCancel(context, 'timeout');
          }, timeoutMs)
        : undefined;
    const onAbort = (): void => {
      this.requestCancel(context, 'signal');
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const workerCount = Math.min(this.concurrency, job.totalCount);
    log.info('Batch started', { total: job.totalCount, concurrency: workerCount });
    this.writeLog(context, `Batch ${job.id} started: ${String(job.totalCount)} rows, ${String(workerCount)} workers`);
    channel.send('onBatchStart', () =>
      this.hooks.onBatchStart?.({
        batchId: job.id,
        timestamp: this.timestamp(),
        total: job.totalCount,
        concurrency: workerCount,
      }),
    );

    try {
      const workers: Promise<void>[] = [];
      for (let workerId = 1; workerId <= workerCount; workerId++) {
        workers.push(this.work(workerId, context));
      }
      await Promise.all(workers);
    } finally {
      if (timeoutId !== undefined) clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }

    if (context.cancelReason !== undefined && job.completedCount < job.totalCount) {
      job.cancel(context.cancelReason);
      this.writeLog(
        context,
        `Batch ${job.id} cancelled (${context.cancelReason}): ${String(job.completedCount)} of ${String(job.totalCount)} rows`,
      );
    } else {
      job.finish();
      this.writeLog(context, `Batch ${job.id} done: ${String(job.completedCount)} rows`);
    }
    log.info('Batch finished', {
      status: job.status,
      completed: job.completedCount,
      total: job.totalCount,
      durationMs: job.durationMs,
    });

    channel.send('onBatchComplete', () => {
      const event: BatchCompleteEvent = {
        batchId: job.id,
        timestamp: this.timestamp(),
        status: job.status,
        completed: job.completedCount,
        total: job.totalCount,
        durationMs: job.durationMs ?? 0,
      };
      if (job.cancelReason !== undefined) {
        event.cancelReason = job.cancelReason;
      }
      return this.hooks.onBatchComplete?.(event);
    });
    await channel.drain();
    return job;
  }

  /**
   * One worker: take the next query until the queue is empty or the batch
   * was cancelled.
   */
  private async work(workerId: number, context: WorkerContext): Promise<void> {
    const { job, channel } = context;
    while (context.cancelReason === undefined && context.next < job.totalCount) {
      const query = job.queries[context.next++];
      job.markDispatched();

      const dispatched = job.dispatchedCount;
      channel.send('onQueryDispatched', () =>
        this.hooks.onQueryDispatched?.({
          batchId: job.id,
          timestamp: this.timestamp(),
          query,
          workerId,
          dispatched,
        }),
      );

      const result =
        query.countryCode === null ? invalidInputResult(query, this.timestamp()) : await this.lookup(query);
      this.record(context, result);
    }
  }

  private async lookup(query: VatQuery): Promise<VatResult> {
    try {
      return await this.client.validate(query);
    } catch (error) {
      this.logger.error('VIES client failed unexpectedly', {
        row: query.sourceRowIndex,
        error: errorMessage(error),
      });
      return createVatResult(query, {
        isValid: null,
        errorCode: 'UNKNOWN',
        message: errorMessage(error),
        requestTimestamp: this.timestamp(),
        attempts: 0,
      });
    }
  }

  /**
   * Store a result and queue its notifications.
   */
  private record(context: WorkerContext, result: VatResult): void {
    const { job, channel } = context;
    job.recordResult(result);
    const completed = job.completedCount;
    const total = job.totalCount;

    channel.send('onResult', () =>
      this.hooks.onResult?.({ batchId: job.id, timestamp: this.timestamp(), result }),
    );
    channel.send('onProgress', () =>
      this.hooks.onProgress?.({ batchId: job.id, timestamp: this.timestamp(), result, completed, total }),
    );
  }

  private requestCancel(context: WorkerContext, reason: CancelReason): void {
    if (context.cancelReason !== undefined || context.job.status !== 'RUNNING') return;
    context.cancelReason = reason;
    this.logger.info('Batch cancellation requested', { batchId: context.job.id, reason });
    this.writeLog(context, `Cancelling batch ${context.job.id} (${reason}); waiting for requests in flight`);
  }

  private writeLog(context: WorkerContext, message: string): void {
    const entry: LiveLogEntry = { timestamp: this.timestamp(), kind: 'info', message };
    try {
      context.logSink.write(entry);
    } catch (error) {
      this.logger.warn('Live log sink failed', { error: errorMessage(error) });
    }
  }

  private timestamp(): string {
    return this.clock.now().toISOString();
  }
}
