import { describe, it, expect, vi } from 'vitest';
import { toVatQuery } from '@vies-batch/shared';
import { HttpViesClient, DEFAULT_VIES_BASE_URL } from './vies-client.js';
import { MemoryResultCache } from './memory-result-cache.js';
import { MemoryLogSink } from './log-sinks.js';
import type { HttpClient, HttpRequestOptions, HttpResponse } from './http-client.js';

const ITALIAN_VAT = toVatQuery('IT05159640266', 0);
const ITALIAN_URL = `${DEFAULT_VIES_BASE_URL}/ms/IT/vat/05159640266`;

function response(status: number, body: unknown, statusText = 'OK'): HttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(text),
  };
}

/**
 * HTTP client answering each call with the next scripted response or error.
 */
function scriptedClient(...script: (HttpResponse | Error)[]) {
  const get = vi.fn<HttpClient['get']>();
  for (const step of script) {
    if (step instanceof Error) {
      get.mockRejectedValueOnce(step);
    } else {
      get.mockResolvedValueOnce(step);
    }
  }
  return { get };
}

/**
 * HTTP client that never answers until the request is aborted.
 */
function hangingClient() {
  const get = vi.fn((_url: string, options?: HttpRequestOptions) =>
    new Promise<HttpResponse>((_resolve, reject) => {
      options?.signal?.addEventListener('abort', () => {
        const error = new Error('This operation was aborted');
        error.name = 'AbortError';
        reject(error);
      });
    }),
  );
  return { get };
}

describe('HttpViesClient', () => {
  describe('successful lookups', () => {
    it('should map the valid/traderName/traderAddress aliases', async () => {
      const httpClient = scriptedClient(response(200, { valid: true, traderName: 'ACME', traderAddress: 'X' }));
      const client = new HttpViesClient({ httpClient, retryDelayMs: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.isValid).toBe(true);
      expect(result.companyName).toBe('ACME');
      expect(result.companyAddress).toBe('X');
      expect(result.errorCode).toBe('VALID');
      expect(result.attempts).toBe(1);
      expect(result.fromCache).toBe(false);
      expect(result.query).toBe(ITALIAN_VAT);
      expect(httpClient.get).toHaveBeenCalledTimes(1);
      expect(httpClient.get.mock.calls[0]?.[0]).toBe(ITALIAN_URL);
    });

    it('should send the JSON accept header and an abort signal', async () => {
      const httpClient = scriptedClient(response(200, { isValid: true }));
      const client = new HttpViesClient({ httpClient });

      await client.validate(ITALIAN_VAT);

      const options = httpClient.get.mock.calls[0]?.[1];
      expect(options?.headers).toEqual({ Accept: 'application/json' });
      expect(options?.signal).toBeInstanceOf(AbortSignal);
    });

    it('should report an INVALID answer with the service request date', async () => {
      const httpClient = scriptedClient(
        response(200, { isValid: false, requestDate: '2024-03-01T10:00:00.000Z', userError: 'INVALID', name: '---', address: '---' }),
      );
      const client = new HttpViesClient({ httpClient });

      const result = await client.validate(ITALIAN_VAT);

      expect(result).toMatchObject({ isValid: false, errorCode: 'INVALID', requestDate: '2024-03-01T10:00:00.000Z' });
      expect(result.companyName).toBeUndefined();
      expect(result.companyAddress).toBeUndefined();
    });

    it('should build the URL from a custom base and encode the parameters', () => {
      const client = new HttpViesClient({ baseUrl: 'http://localhost:9999/vies/', httpClient: scriptedClient() });
      expect(client.buildUrl('NL', '123456789B01')).toBe('http://localhost:9999/vies/ms/NL/vat/123456789B01');
      expect(client.buildUrl('ES', 'A/1')).toBe('http://localhost:9999/vies/ms/ES/vat/A%2F1');
    });

    it('should validate a raw number typed by a user', async () => {
      const httpClient = scriptedClient(response(200, { isValid: true, name: 'Example SpA' }));
      const client = new HttpViesClient({ httpClient });

      const result = await client.validateRaw(' it 0515 9640266 ');

      expect(result.companyName).toBe('Example SpA');
      expect(httpClient.get.mock.calls[0]?.[0]).toBe(ITALIAN_URL);
    });
  });

  describe('validateNumber', () => {
    it('should look up a split country code and number', async () => {
      const httpClient = scriptedClient(response(200, { valid: true, traderName: 'ACME', traderAddress: 'X' }));
      const client = new HttpViesClient({ httpClient });

      const result = await client.validateNumber('IT', '05159640266');

      expect(result.isValid).toBe(true);
      expect(result.companyName).toBe('ACME');
      expect(result.query).toMatchObject({ countryCode: 'IT', number: '05159640266' });
      expect(httpClient.get.mock.calls[0]?.[0]).toBe(ITALIAN_URL);
    });

    it('should normalize case and spacing before building the URL', async () => {
      const httpClient = scriptedClient(response(200, { isValid: false }));
      const client = new HttpViesClient({ httpClient });

      const result = await client.validateNumber('it', ' 0515 9640266 ');

      expect(result.errorCode).toBe('INVALID');
      expect(httpClient.get.mock.calls[0]?.[0]).toBe(ITALIAN_URL);
    });

    it('should answer an unknown country locally', async () => {
      const httpClient = scriptedClient();
      const client = new HttpViesClient({ httpClient });

      const result = await client.validateNumber('ZZ', '1');

      expect(result.errorCode).toBe('INVALID_INPUT');
      expect(result.isValid).toBeNull();
      expect(httpClient.get).not.toHaveBeenCalled();
    });
  });

  describe('input errors', () => {
    it('should answer an unrecognized prefix locally without a request', async () => {
      const httpClient = scriptedClient();
      const client = new HttpViesClient({ httpClient });

      const result = await client.validateRaw('ZZ123456');

      expect(result.errorCode).toBe('INVALID_INPUT');
      expect(result.isValid).toBeNull();
      expect(result.query.countryCode).toBeNull();
      expect(result.attempts).toBe(0);
      expect(httpClient.get).not.toHaveBeenCalled();
    });
  });

  describe('failures and retries', () => {
    it('should return TIMEOUT after exactly two attempts when both time out', async () => {
      const httpClient = hangingClient();
      const client = new HttpViesClient({ httpClient, timeoutMs: 20, retryDelayMs: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('TIMEOUT');
      expect(result.isValid).toBeNull();
      expect(result.attempts).toBe(2);
      expect(result.message).toBe('Request timed out after 20ms');
      expect(httpClient.get).toHaveBeenCalledTimes(2);
    });

    it('should recover when the retry succeeds after a network error', async () => {
      const httpClient = scriptedClient(new Error('ECONNRESET'), response(200, { isValid: true }));
      const client = new HttpViesClient({ httpClient, retryDelayMs: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('VALID');
      expect(result.attempts).toBe(2);
      expect(httpClient.get).toHaveBeenCalledTimes(2);
    });

    it('should give up with SERVICE_UNAVAILABLE after two network errors', async () => {
      const httpClient = scriptedClient(new Error('ECONNRESET'), new Error('ECONNRESET'), response(200, { isValid: true }));
      const client = new HttpViesClient({ httpClient, retryDelayMs: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('SERVICE_UNAVAILABLE');
      expect(result.message).toBe('Network error: ECONNRESET');
      expect(httpClient.get).toHaveBeenCalledTimes(2);
    });

    it('should not retry a plain HTTP error', async () => {
      const httpClient = scriptedClient(response(500, 'boom', 'Internal Server Error'), response(200, { isValid: true }));
      const client = new HttpViesClient({ httpClient, retryDelayMs: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('SERVICE_UNAVAILABLE');
      expect(result.message).toBe('HTTP 500 Internal Server Error');
      expect(result.attempts).toBe(1);
      expect(httpClient.get).toHaveBeenCalledTimes(1);
    });

    it('should retry throttling statuses once', async () => {
      const httpClient = scriptedClient(response(429, '', 'Too Many Requests'), response(200, { isValid: true }));
      const client = new HttpViesClient({ httpClient, retryDelayMs: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('VALID');
      expect(httpClient.get).toHaveBeenCalledTimes(2);
    });

    it('should honour a retry count of zero', async () => {
      const httpClient = scriptedClient(new Error('ECONNRESET'), response(200, { isValid: true }));
      const client = new HttpViesClient({ httpClient, retries: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('SERVICE_UNAVAILABLE');
      expect(httpClient.get).toHaveBeenCalledTimes(1);
    });

    it('should treat a malformed body as SERVICE_UNAVAILABLE without retrying', async () => {
      const httpClient = scriptedClient(response(200, '<html>maintenance</html>'));
      const client = new HttpViesClient({ httpClient, retryDelayMs: 0 });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('SERVICE_UNAVAILABLE');
      expect(result.message).toBe('Response body is not valid JSON');
      expect(httpClient.get).toHaveBeenCalledTimes(1);
    });

    it('should record a VIES userError verbatim', async () => {
      const httpClient = scriptedClient(response(200, { isValid: false, userError: 'MS_UNAVAILABLE' }));
      const client = new HttpViesClient({ httpClient });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('MS_UNAVAILABLE');
      expect(result.isValid).toBeNull();
      expect(result.message).toBe('VIES reported MS_UNAVAILABLE');
    });

    it('should answer SERVICE_UNAVAILABLE once closed', async () => {
      const httpClient = scriptedClient(response(200, { isValid: true }));
      const client = new HttpViesClient({ httpClient });
      await client.close();

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('SERVICE_UNAVAILABLE');
      expect(httpClient.get).not.toHaveBeenCalled();
    });
  });

  describe('result cache', () => {
    it('should serve a repeated definitive lookup from the cache', async () => {
      const httpClient = scriptedClient(response(200, { isValid: true, name: 'ACME' }));
      const cache = new MemoryResultCache({ cleanupIntervalMs: 0 });
      const client = new HttpViesClient({ httpClient, cache });

      await client.validate(ITALIAN_VAT);
      const second = await client.validate(toVatQuery('IT 05159640266', 7));

      expect(httpClient.get).toHaveBeenCalledTimes(1);
      expect(second).toMatchObject({
        isValid: true,
        errorCode: 'VALID',
        companyName: 'ACME',
        attempts: 0,
        fromCache: true,
      });
      expect(second.query.sourceRowIndex).toBe(7);
      await cache.close();
    });

    it('should not cache service failures', async () => {
      const httpClient = scriptedClient(
        response(200, { userError: 'MS_MAX_CONCURRENT_REQ' }),
        response(200, { isValid: true }),
      );
      const cache = new MemoryResultCache({ cleanupIntervalMs: 0 });
      const client = new HttpViesClient({ httpClient, cache });

      const first = await client.validate(ITALIAN_VAT);
      const second = await client.validate(ITALIAN_VAT);

      expect(first.errorCode).toBe('MS_MAX_CONCURRENT_REQ');
      expect(second.errorCode).toBe('VALID');
      expect(httpClient.get).toHaveBeenCalledTimes(2);
      await cache.close();
    });
  });

  describe('live log', () => {
    it('should log the request and the response', async () => {
      const httpClient = scriptedClient(response(200, { isValid: true }));
      const logSink = new MemoryLogSink();
      const client = new HttpViesClient({ httpClient, logSink });

      await client.validate(ITALIAN_VAT);

      const entries = logSink.entries();
      expect(entries.map((e) => e.kind)).toEqual(['request', 'response']);
      expect(entries[0]?.message).toBe(`GET ${ITALIAN_URL} (attempt 1/2)`);
      expect(entries[1]).toMatchObject({ message: 'HTTP 200 OK', status: 200, body: '{"isValid":true}' });
    });

    it('should log errors and retries', async () => {
      const httpClient = scriptedClient(new Error('ECONNRESET'), response(200, { isValid: true }));
      const logSink = new MemoryLogSink();
      const client = new HttpViesClient({ httpClient, logSink, retryDelayMs: 0 });

      await client.validate(ITALIAN_VAT);

      expect(logSink.entries().map((e) => e.kind)).toEqual(['request', 'error', 'info', 'request', 'response']);
      expect(logSink.entries()[1]?.message).toBe('Network error: ECONNRESET');
    });

    it('should truncate long bodies', async () => {
      const httpClient = scriptedClient(response(503, 'x'.repeat(20), 'Service Unavailable'), response(503, '', 'Service Unavailable'));
      const logSink = new MemoryLogSink();
      const client = new HttpViesClient({ httpClient, logSink, retryDelayMs: 0, maxLoggedBodyLength: 5 });

      await client.validate(ITALIAN_VAT);

      expect(logSink.entries()[1]?.body).toBe('xxxxx...');
    });

    it('should ignore a failing sink', async () => {
      const httpClient = scriptedClient(response(200, { isValid: true }));
      const logSink = {
        write: vi.fn(() => {
          throw new Error('display closed');
        }),
      };
      const client = new HttpViesClient({ httpClient, logSink });

      const result = await client.validate(ITALIAN_VAT);

      expect(result.errorCode).toBe('VALID');
      expect(logSink.write).toHaveBeenCalledTimes(2);
    });
  });
});
