import { logger } from '../utils/logger';
import { exponentialDelay, sleep as defaultSleep, type Sleeper } from '../utils/backoff';
import { describeError, HttpStatusError, isAbortError } from '../utils/errors';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BACKOFF_BASE_MS = 1000;
const DEFAULT_TIMEOUT_MS = 10000;
const CONTENT_TYPE_JSON = 'application/json';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  /** Serialized as JSON. */
  body?: unknown;
  /** Sent as multipart/form-data; takes precedence over `body`. */
  form?: FormData;
  params?: QueryParams;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpClientOptions {
  headers?: Record<string, string>;
  maxRetries?: number;
  backoffBaseMs?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  sleep?: Sleeper;
}

function buildUrl(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

function createTimeoutController(timeoutMs: number): { controller: AbortController; timeoutId: NodeJS.Timeout } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  return { controller, timeoutId };
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Bounded-retry HTTP client. Every failure mode (connection, timeout,
 * non-2xx status, unexpected exception) is retried with exponential
 * backoff; once the attempts are used up the last error is logged and
 * `null` is returned instead of thrown, so callers must read `null` as
 * "the request did not complete".
 */
export class HttpClient {
  private readonly headers: Record<string, string>;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleeper;

  constructor(options: HttpClientOptions = {}) {
    this.headers = { ...options.headers };
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Resolves to the decoded JSON body, the raw text when it is not JSON, or `null` on exhaustion. */
  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.execute(method, url, options, async (response) => parseBody(await response.text()));
  }

  /** Resolves to the live response for incremental reading of its body, or `null` on exhaustion. */
  async stream(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<Response | null> {
    return this.execute(method, url, options, async (response) => response);
  }

  private async execute<T>(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T | null> {
    const target = buildUrl(url, options.params);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const { controller, timeoutId } = createTimeoutController(options.timeoutMs ?? this.timeoutMs);

      try {
        const response = await this.fetchImpl(target, {
          method,
          headers: this.buildHeaders(options),
          body: this.buildBody(options),
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new HttpStatusError(response.status, target, await response.text());
        }

        return await read(response);
      } catch (error) {
        lastError = error;
        logger.error(`${this.describeFailure(error, target)} (attempt ${attempt}/${this.maxRetries})`);
      } finally {
        clearTimeout(timeoutId);
      }

      if (attempt < this.maxRetries) {
        const delay = exponentialDelay(attempt, this.backoffBaseMs);
        logger.info(`Retrying in ${delay / 1000} seconds...`);
        await this.sleep(delay);
      }
    }

    logger.error(`All ${this.maxRetries} requests to ${target} failed. Last error: ${describeError(lastError)}`);
    return null;
  }

  private buildHeaders(options: RequestOptions): Record<string, string> {
    const headers = { ...this.headers, ...options.headers };
    if (!options.form && options.body !== undefined) {
      headers['Content-Type'] = CONTENT_TYPE_JSON;
    }
    return headers;
  }

  private buildBody(options: RequestOptions): FormData | string | undefined {
    if (options.form) {
      return options.form;
    }
    return options.body === undefined ? undefined : JSON.stringify(options.body);
  }

  private describeFailure(error: unknown, url: string): string {
    if (isAbortError(error)) {
      return `Timeout calling ${url}`;
    }
    if (error instanceof HttpStatusError) {
      return `Http error calling ${url}: ${describeError(error)}`;
    }
    if (error instanceof TypeError) {
      return `Error connecting to ${url}: ${describeError(error.cause ?? error)}`;
    }
    return `Unexpected error during request to ${url}: ${describeError(error)}`;
  }
}
