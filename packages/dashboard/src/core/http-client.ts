/**
 * HTTP client for external registries
 *
 * One GET over native fetch with typed errors. The timeout covers the whole
 * exchange, from connecting until the body has been read; no retries.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 10_000 });
 * const data = await client.fetchJSON('https://ws.geonorge.no/kommuneinfo/v1/kommuner');
 * ```
 */

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Request timeout in milliseconds, body included (default: 10000) */
  readonly timeoutMs: number;

  readonly userAgent: string;

  /** Injected for tests; defaults to the global fetch */
  readonly fetchImpl: typeof fetch;
}

export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'HTTPError';
  }
}

export class HTTPTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
  }
}

export class HTTPNetworkError extends Error {
  constructor(
    public readonly url: string,
    cause: Error
  ) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
  }
}

export class HTTPJSONParseError extends Error {
  readonly responseText: string;

  constructor(
    public readonly url: string,
    responseText: string,
    cause: Error
  ) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 10_000,
      userAgent: 'piggdekk-dashboard/0.1',
      fetchImpl: (input, init) => fetch(input, init),
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For non-2xx responses
   * @throws {HTTPTimeoutError} If the response, body included, takes longer than the timeout
   * @throws {HTTPNetworkError} For connection failures
   * @throws {HTTPJSONParseError} If the body is not JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    // Settles only when the timer fires; a stalled body stream ignores the abort
    const expired = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new HTTPTimeoutError(url, timeoutMs));
      }, timeoutMs);
    });

    try {
      const text = await Promise.race([this.readBody(url, controller.signal, timeoutMs, options), expired]);
      return this.parseJSON(url, text);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readBody(
    url: string,
    signal: AbortSignal,
    timeoutMs: number,
    options?: FetchOptions
  ): Promise<string> {
    let response: Response;
    try {
      response = await this.config.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
          ...options?.headers,
        },
        signal,
      });
    } catch (error) {
      throw this.transportError(url, signal, timeoutMs, error);
    }

    if (!response.ok) {
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
    }

    try {
      return await response.text();
    } catch (error) {
      throw this.transportError(url, signal, timeoutMs, error);
    }
  }

  private transportError(url: string, signal: AbortSignal, timeoutMs: number, error: unknown): Error {
    if (signal.aborted) {
      return new HTTPTimeoutError(url, timeoutMs);
    }
    return new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
  }

  private parseJSON(url: string, text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }
}
