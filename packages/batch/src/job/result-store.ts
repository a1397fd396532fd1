import type { VatResult } from '@vies-batch/contracts';
import { InvalidStateError } from '@vies-batch/shared';

/**
 * Results of a batch keyed by source row index.
 *
 * Inserts are checked: an index outside the batch or a second result for
 * the same index is rejected.
 */
export class ResultStore {
  private readonly results = new Map<number, VatResult>();

  constructor(private readonly indices: ReadonlySet<number>) {}

  insert(result: VatResult): void {
    const index = result.query.sourceRowIndex;
    if (!this.indices.has(index)) {
      throw new InvalidStateError(`No query with row index ${String(index)} in this batch`, { index });
    }
    if (this.results.has(index)) {
      throw new InvalidStateError(`Row ${String(index)} already has a result`, { index });
    }
    this.results.set(index, result);
  }

  get(index: number): VatResult | undefined {
    return this.results.get(index);
  }

  has(index: number): boolean {
    return this.results.has(index);
  }

  get size(): number {
    return this.results.size;
  }

  /**
   * Read-only view in insertion (completion) order.
   */
  view(): ReadonlyMap<number, VatResult> {
    return this.results;
  }
}
