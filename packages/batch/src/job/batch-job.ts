import type { BatchStatus, CancelReason, VatQuery, VatResult } from '@vies-batch/contracts';
import {
  defaultClock,
  defaultIdGenerator,
  generateBatchId,
  InvalidStateError,
  type Clock,
  type IdGenerator,
} from '@vies-batch/shared';
import { ResultStore } from './result-store.js';

export interface BatchJobInit {
  queries: readonly VatQuery[];
  /**
   * Optional clock for deterministic testing.
   */
  clock?: Clock;
  /**
   * Optional ID generator for deterministic testing.
   */
  idGenerator?: IdGenerator;
}

/**
 * State of one batch run.
 *
 * Status moves PENDING → RUNNING → DONE | CANCELLED and never back.
 */
export class BatchJob {
  readonly id: string;
  readonly queries: readonly VatQuery[];
  readonly createdAt: string;

  private readonly clock: Clock;
  private readonly store: ResultStore;
  private _status: BatchStatus = 'PENDING';
  private _dispatched = 0;
  private _startedAt?: string;
  private _finishedAt?: string;
  private _cancelReason?: CancelReason;

  constructor(init: BatchJobInit) {
    this.clock = init.clock ?? defaultClock;
    this.id = generateBatchId(init.idGenerator ?? defaultIdGenerator);
    this.queries = Object.freeze([...init.queries]);
    this.createdAt = this.clock.now().toISOString();

    const indices = new Set<number>();
    for (const query of this.queries) {
      if (indices.has(query.sourceRowIndex)) {
        throw new InvalidStateError(`Duplicate row index ${String(query.sourceRowIndex)}`);
      }
      indices.add(query.sourceRowIndex);
    }
    this.store = new ResultStore(indices);
  }

  get status(): BatchStatus {
    return this._status;
  }

  get results(): ReadonlyMap<number, VatResult> {
    return this.store.view();
  }

  get totalCount(): number {
    return this.queries.length;
  }

  get completedCount(): number {
    return this.store.size;
  }

  get dispatchedCount(): number {
    return this._dispatched;
  }

  get startedAt(): string | undefined {
    return this._startedAt;
  }

  get finishedAt(): string | undefined {
    return this._finishedAt;
  }

  get cancelReason(): CancelReason | undefined {
    return this._cancelReason;
  }

  get durationMs(): number | undefined {
    if (this._startedAt === undefined || this._finishedAt === undefined) return undefined;
    return Date.parse(this._finishedAt) - Date.parse(this._startedAt);
  }

  /**
   * Results sorted by source row index; rows without a result are skipped.
   */
  orderedResults(): VatResult[] {
    return [...this.store.view().values()].sort((a, b) => a.query.sourceRowIndex - b.query.sourceRowIndex);
  }

  // State changes (used by the orchestrator)

  start(): void {
    this.transition('PENDING', 'RUNNING');
    this._startedAt = this.clock.now().toISOString();
  }

  markDispatched(): void {
    this.assertStatus('RUNNING');
    this._dispatched++;
  }

  recordResult(result: VatResult): void {
    this.assertStatus('RUNNING');
    this.store.insert(result);
  }

  finish(): void {
    if (this.store.size !== this.queries.length) {
      throw new InvalidStateError(
        `Cannot finish batch ${this.id}: ${String(this.store.size)} of ${String(this.queries.length)} results`,
      );
    }
    this.transition('RUNNING', 'DONE');
    this._finishedAt = this.clock.now().toISOString();
  }

  cancel(reason: CancelReason): void {
    this.transition('RUNNING', 'CANCELLED');
    this._cancelReason = reason;
    this._finishedAt = this.clock.now().toISOString();
  }

  private transition(from: BatchStatus, to: BatchStatus): void {
    if (this._status !== from) {
      throw new InvalidStateError(`Batch ${this.id} cannot move from ${this._status} to ${to}`, {
        batchId: this.id,
        status: this._status,
        to,
      });
    }
    this._status = to;
  }

  private assertStatus(expected: BatchStatus): void {
    if (this._status !== expected) {
      throw new InvalidStateError(`Batch ${this.id} is ${this._status}, expected ${expected}`);
    }
  }
}
