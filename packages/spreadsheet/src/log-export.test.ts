import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemoryLogSink } from '@vies-batch/vies-client';
import { exportLog } from './log-export.js';
import { defaultLogFileName, defaultResultsFileName } from './file-names.js';

describe('exportLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vies-batch-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one line per entry', async () => {
    const sink = new MemoryLogSink();
    const timestamp = new Date(2024, 2, 1, 10, 4, 5).toISOString();
    sink.write({ timestamp, kind: 'request', message: 'GET https://vies.test/ms/IT/vat/05159640266 (attempt 1/2)' });
    sink.write({ timestamp, kind: 'response', message: 'HTTP 200 OK', body: '{"isValid":true}' });

    const file = await exportLog(sink, join(dir, 'log.txt'));

    expect(await readFile(file, 'utf8')).toBe(
      '[10:04:05] REQUEST GET https://vies.test/ms/IT/vat/05159640266 (attempt 1/2)\n' +
        '[10:04:05] RESPONSE HTTP 200 OK {"isValid":true}\n',
    );
  });

  it('should write an empty file for an empty log', async () => {
    const file = await exportLog(new MemoryLogSink(), join(dir, 'empty.txt'));
    expect(await readFile(file, 'utf8')).toBe('');
  });
});

describe('default file names', () => {
  it('should stamp local date and time', () => {
    const date = new Date(2024, 0, 5, 9, 3, 7);
    expect(defaultResultsFileName(date)).toBe('vat_results_20240105_090307.xlsx');
    expect(defaultLogFileName(date)).toBe('vat_request_log_20240105_090307.txt');
  });
});
