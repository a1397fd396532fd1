/**
 * HTTP client interface for pluggable HTTP implementation.
 * Tests substitute a stub; production uses {@link createDefaultHttpClient}.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * HTTP response interface
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/**
 * Default HTTP client using the global fetch of Node.js 20.
 */
export function createDefaultHttpClient(): HttpClient {
  const httpRequest: typeof globalThis.fetch = globalThis.fetch;

  return {
    async get(url, options) {
      const init: RequestInit = { method: 'GET' };
      if (options?.headers !== undefined) {
        init.headers = options.headers;
      }
      if (options?.signal !== undefined) {
        init.signal = options.signal;
      }
      return httpRequest(url, init);
    },
  };
}

/**
 * Whether a rejected request was aborted (fetch raises a DOMException named AbortError).
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
