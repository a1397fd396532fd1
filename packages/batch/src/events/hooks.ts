/**
 * Batch Event Hooks
 *
 * Progress notifications for whatever presents a batch (CLI, UI).
 * The orchestrator delivers events one at a time, in order.
 *
 * @packageDocumentation
 */

import type { BatchStatus, CancelReason, VatQuery, VatResult } from '@vies-batch/contracts';

/**
 * Event emitted when a batch starts dispatching.
 */
export interface BatchStartEvent {
  batchId: string;
  timestamp: string;
  total: number;
  concurrency: number;
}

/**
 * Event emitted when a query is handed to a worker.
 */
export interface QueryDispatchedEvent {
  batchId: string;
  timestamp: string;
  query: VatQuery;
  workerId: number;
  dispatched: number;
}

/**
 * Event emitted when a result is recorded in the job.
 */
export interface QueryResultEvent {
  batchId: string;
  timestamp: string;
  result: VatResult;
}

/**
 * Event emitted after each recorded result.
 */
export interface BatchProgressEvent {
  batchId: string;
  timestamp: string;
  result: VatResult;
  completed: number;
  total: number;
}

/**
 * Event emitted once the batch reached DONE or CANCELLED.
 */
export interface BatchCompleteEvent {
  batchId: string;
  timestamp: string;
  status: BatchStatus;
  cancelReason?: CancelReason;
  completed: number;
  total: number;
  durationMs: number;
}

/**
 * Batch event hooks interface. All methods are optional and may be async;
 * a hook that throws is logged and does not affect the batch.
 *
 * @example
 * ```typescript
 * const hooks: BatchEventHooks = {
 *   onProgress: ({ completed, total }) => bar.update(completed / total),
 * };
 * ```
 */
export interface BatchEventHooks {
  onBatchStart?(event: BatchStartEvent): void | Promise<void>;

  onQueryDispatched?(event: QueryDispatchedEvent): void | Promise<void>;

  onResult?(event: QueryResultEvent): void | Promise<void>;

  onProgress?(event: BatchProgressEvent): void | Promise<void>;

  onBatchComplete?(event: BatchCompleteEvent): void | Promise<void>;
}

/**
 * Composite event hooks that dispatches to multiple listeners.
 */
export class CompositeEventHooks implements BatchEventHooks {
  private readonly hooks: BatchEventHooks[];

  constructor(hooks: BatchEventHooks[]) {
    this.hooks = hooks;
  }

  async onBatchStart(event: BatchStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onBatchStart?.(event)));
  }

  async onQueryDispatched(event: QueryDispatchedEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onQueryDispatched?.(event)));
  }

  async onResult(event: QueryResultEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onResult?.(event)));
  }

  async onProgress(event: BatchProgressEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onProgress?.(event)));
  }

  async onBatchComplete(event: BatchCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onBatchComplete?.(event)));
  }
}

/**
 * No-op event hooks (default when no hooks configured).
 */
export class NoopEventHooks implements BatchEventHooks {}

/**
 * Console event hooks for debugging.
 */
export class ConsoleEventHooks implements BatchEventHooks {
  private readonly prefix: string;

  constructor(options?: { prefix?: string }) {
    this.prefix = options?.prefix ?? '[BatchEvents]';
  }

  onBatchStart(event: BatchStartEvent): void {
    console.log(`${this.prefix} Batch started`, {
      batchId: event.batchId,
      total: event.total,
      concurrency: event.concurrency,
    });
  }

  onProgress(event: BatchProgressEvent): void {
    console.log(`${this.prefix} ${String(event.completed)}/${String(event.total)}`, {
      row: event.result.query.sourceRowIndex,
      errorCode: event.result.errorCode,
    });
  }

  onBatchComplete(event: BatchCompleteEvent): void {
    console.log(`${this.prefix} Batch ${event.status.toLowerCase()}`, {
      batchId: event.batchId,
      completed: event.completed,
      total: event.total,
      durationMs: event.durationMs,
    });
  }
}
