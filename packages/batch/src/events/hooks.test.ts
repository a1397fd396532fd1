import { describe, it, expect, vi, afterEach } from 'vitest';
import { createVatResult, toVatQuery } from '@vies-batch/shared';
import { CompositeEventHooks, ConsoleEventHooks, NoopEventHooks, type BatchProgressEvent } from './hooks.js';

const progressEvent: BatchProgressEvent = {
  batchId: 'batch-1',
  timestamp: '2024-03-01T10:00:00.000Z',
  result: createVatResult(toVatQuery('IT05159640266', 2), {
    isValid: true,
    errorCode: 'VALID',
    requestTimestamp: '2024-03-01T10:00:00.000Z',
    attempts: 1,
  }),
  completed: 1,
  total: 3,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('CompositeEventHooks', () => {
  it('should forward each event to every listener that handles it', async () => {
    const first = { onProgress: vi.fn() };
    const second = { onProgress: vi.fn(() => Promise.resolve()) };
    const composite = new CompositeEventHooks([first, second, new NoopEventHooks()]);

    await composite.onProgress(progressEvent);

    expect(first.onProgress).toHaveBeenCalledWith(progressEvent);
    expect(second.onProgress).toHaveBeenCalledWith(progressEvent);
  });

  it('should reject when a listener fails', async () => {
    const composite = new CompositeEventHooks([
      {
        onBatchStart: () => {
          throw new Error('listener down');
        },
      },
    ]);

    await expect(
      composite.onBatchStart({ batchId: 'batch-1', timestamp: '2024-03-01T10:00:00.000Z', total: 3, concurrency: 2 }),
    ).rejects.toThrow('listener down');
  });
});

describe('ConsoleEventHooks', () => {
  it('should log progress with the configured prefix', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleEventHooks({ prefix: '[test]' }).onProgress(progressEvent);

    expect(log).toHaveBeenCalledWith('[test] 1/3', { row: 2, errorCode: 'VALID' });
  });
});
