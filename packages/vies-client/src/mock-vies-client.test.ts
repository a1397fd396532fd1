import { describe, it, expect } from 'vitest';
import { toVatQuery } from '@vies-batch/shared';
import { MockViesClient } from './mock-vies-client.js';

describe('MockViesClient', () => {
  it('should answer configured entries', async () => {
    const client = new MockViesClient({
      entries: { IT05159640266: { errorCode: 'VALID', companyName: 'ACME', companyAddress: 'X' } },
    });

    const result = await client.validate(toVatQuery('IT05159640266', 0));

    expect(result).toMatchObject({ isValid: true, errorCode: 'VALID', companyName: 'ACME', attempts: 1 });
    expect(client.calls).toHaveLength(1);
  });

  it('should use digit parity when nothing is configured', async () => {
    const client = new MockViesClient();

    expect((await client.validate(toVatQuery('DE123456788', 0))).errorCode).toBe('VALID');
    expect((await client.validate(toVatQuery('DE123456789', 1))).errorCode).toBe('INVALID');
  });

  it('should map service error codes to unknown validity', async () => {
    const client = new MockViesClient({ fallback: { errorCode: 'MS_UNAVAILABLE' } });
    const result = await client.validate(toVatQuery('FR12345678901', 0));

    expect(result.isValid).toBeNull();
    expect(result.errorCode).toBe('MS_UNAVAILABLE');
  });

  it('should not record queries that failed formatting', async () => {
    const client = new MockViesClient();
    const result = await client.validate(toVatQuery('ZZ1', 0));

    expect(result.errorCode).toBe('INVALID_INPUT');
    expect(client.calls).toHaveLength(0);
  });
});
