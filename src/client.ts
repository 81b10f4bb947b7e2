import type { z } from 'zod';
import type { DeepLinkingConfig } from './types.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = 'deferred-links-sdk/1.0.0';

export type DeepLinkingErrorCode =
  | 'notConfigured'
  | 'invalidURL'
  | 'invalidRequest'
  | 'invalidResponse'
  | 'networkError'
  | 'unauthorized'
  | 'rateLimited'
  | 'serverError'
  | 'noData';

const ERROR_MESSAGES: Record<DeepLinkingErrorCode, string> = {
  notConfigured: 'SDK not configured. Call configure() first.',
  invalidURL: 'Invalid URL provided',
  invalidRequest: 'Invalid request parameters',
  invalidResponse: 'Invalid response from server',
  networkError: 'Network error occurred',
  unauthorized: 'Invalid API key or unauthorized access',
  rateLimited: 'API rate limit exceeded',
  serverError: 'Server error occurred',
  noData: 'No data received from server',
};

export class DeepLinkingError extends Error {
  code: DeepLinkingErrorCode;
  status: number | undefined;

  constructor(code: DeepLinkingErrorCode, message?: string, status?: number) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'DeepLinkingError';
    this.code = code;
    this.status = status;
  }
}

export interface HttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export interface RequestOptions {
  params?: Record<string, string>;
  body?: Record<string, unknown>;
  /** Fail with notConfigured when no API key is set (link management endpoints) */
  requireApiKey?: boolean;
}

/**
 * Normalize and validate a base URL. Trailing slashes are stripped so that
 * paths can be appended directly.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new DeepLinkingError('invalidURL', 'DeepLinking: baseUrl must be a valid URL (e.g. https://links.example.com)');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new DeepLinkingError('invalidURL', 'DeepLinking: baseUrl must use http: or https: protocol');
  }
  return baseUrl.replace(/\/+$/, '');
}

export class HttpClient {
  private _baseUrl = '';
  private apiKey: string | undefined;
  private abortController: AbortController | null = null;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(config?: DeepLinkingConfig, options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    if (config) this.configure(config);
  }

  /** Set the base URL and API key. Throws invalidURL for a malformed base URL. */
  configure(config: DeepLinkingConfig): void {
    this._baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey || undefined;
  }

  get isConfigured(): boolean {
    return this._baseUrl !== '';
  }

  get baseUrl(): string {
    return this._baseUrl;
  }

  get hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  /** Abort all in-flight requests (called by DeepLinking.destroy()) */
  abort(): void {
    if (this.abortController) {
      this.abortController.abort();
      this.abortController = null;
    }
  }

  /** Get a signal for the current request batch, creating a controller if needed */
  private get signal(): AbortSignal {
    if (!this.abortController) {
      this.abortController = new AbortController();
    }
    return this.abortController.signal;
  }

  async get<T>(path: string, schema: z.ZodType<T>, options: Omit<RequestOptions, 'body'> = {}): Promise<T> {
    return this.request('GET', path, schema, options);
  }

  async post<T>(path: string, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    return this.request('POST', path, schema, options);
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T>,
    options: RequestOptions,
  ): Promise<T> {
    if (!this.isConfigured || (options.requireApiKey && !this.apiKey)) {
      throw new DeepLinkingError('notConfigured');
    }

    let url = this._baseUrl + path;
    if (options.params) {
      const qs = new URLSearchParams(options.params).toString();
      if (qs) url += '?' + qs;
    }

    const headers = this.headers();
    let body: string | undefined;
    if (options.body) {
      try {
        body = JSON.stringify(options.body);
      } catch (err) {
        throw new DeepLinkingError('invalidRequest', `Request body could not be serialized: ${String(err)}`);
      }
      headers['Content-Type'] = 'application/json';
    }

    return this.fetchWithTimeout(url, { method, headers, body }, (res) => {
      if (res.status === 401) {
        throw new DeepLinkingError('unauthorized', undefined, res.status);
      }
      if (res.status === 429) {
        throw new DeepLinkingError('rateLimited', undefined, res.status);
      }
      if (res.status >= 400) {
        throw new DeepLinkingError('serverError', `Server error occurred (HTTP ${res.status})`, res.status);
      }
      return this.parseJson(res, schema);
    });
  }

  /**
   * Fetch and handle the response under one bounded timeout. The timer and
   * abort() cover reading the body as well as waiting for headers. Any
   * failure that is not already a DeepLinkingError is reported as
   * networkError.
   */
  private async fetchWithTimeout<T>(
    url: string,
    init: RequestInit,
    handle: (res: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const parent = this.signal;
    const onAbort = () => controller.abort();
    parent.addEventListener('abort', onAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    // A body stream need not observe the request signal, so race against it
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      const res = await Promise.race([fetch(url, { ...init, signal: controller.signal }), aborted]);
      return await Promise.race([handle(res), aborted]);
    } catch (err) {
      if (timedOut) {
        throw new DeepLinkingError('networkError', `Request timed out after ${this.timeoutMs}ms`);
      }
      if (err instanceof DeepLinkingError) throw err;
      throw new DeepLinkingError(
        'networkError',
        `Network error occurred: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timer);
      parent.removeEventListener('abort', onAbort);
    }
  }

  /** Read the body and validate it against the expected shape */
  private async parseJson<T>(res: Response, schema: z.ZodType<T>): Promise<T> {
    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw new DeepLinkingError('networkError', `Failed to read response body: ${String(err)}`, res.status);
    }
    if (text.trim() === '') {
      throw new DeepLinkingError('noData', undefined, res.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new DeepLinkingError('invalidResponse', 'Invalid JSON in response body', res.status);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.map(String).join('.')}` : '';
      throw new DeepLinkingError('invalidResponse', `Unexpected response shape${where}`, res.status);
    }
    return parsed.data;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.userAgent,
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}
