/**
 * Batch job lifecycle.
 *
 * PENDING → RUNNING → DONE | CANCELLED, one-directional.
 */
export type BatchStatus = 'PENDING' | 'RUNNING' | 'DONE' | 'CANCELLED';

/**
 * Why a batch stopped dispatching early.
 */
export type CancelReason = 'requested' | 'signal' | 'timeout';

/**
 * Progress snapshot emitted after each completed query.
 */
export interface BatchProgress {
  completed: number;
  total: number;
}
