import { DatastoreError } from '../errors.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST';

export interface HttpResponse {
  status: number;
  headers: Headers;
  text: string;
}

export interface RequestOptions {
  body?: string;
  contentType?: string;
  timeoutMs: number;
}

export interface SessionOptions {
  baseUrl: string;
  headers: Record<string, string>;
  fetch?: FetchLike;
  /** Log one line per exchange to stderr. */
  debug?: boolean;
}

/** Trim, drop every trailing '/', and append exactly one. */
export function normalizeBaseUrl(baseUrl: string): string {
  return `${baseUrl.trim().replace(/\/+$/g, '')}/`;
}

/** Join a base URL and a relative path with exactly one '/'. */
export function buildUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/g, '')}/${path.replace(/^\/+/g, '')}`;
}

/** True for the abort raised when a request's timeout signal fires. */
export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

function describeCause(err: unknown): string {
  if (isTimeoutError(err)) return 'request timed out';
  if (err instanceof Error) {
    const cause = err.cause;
    if (cause instanceof Error && cause.message !== '') return `${err.message} (${cause.message})`;
    return err.message;
  }
  return String(err);
}

/**
 * Reusable HTTP session: a base address, headers sent on every request, and
 * the fetch implementation that carries them.
 *
 * Not designed for concurrent use; give each concurrent caller its own
 * client.
 */
export class HttpSession {
  readonly baseUrl: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchImpl: FetchLike;
  private readonly debug: boolean;

  constructor(options: SessionOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.headers = { ...options.headers };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.debug = options.debug ?? false;
  }

  url(path: string): string {
    return buildUrl(this.baseUrl, path);
  }

  /**
   * Issue one request and read its body.
   *
   * @throws DatastoreError wrapping any transport failure (DNS, refused
   *   connection, timeout, interrupted body).
   */
  async request(method: HttpMethod, path: string, options: RequestOptions): Promise<HttpResponse> {
    const url = this.url(path);
    const headers: Record<string, string> = { ...this.headers };
    if (options.contentType !== undefined) {
      headers['Content-Type'] = options.contentType;
    }

    let resp: Response;
    let text: string;
    try {
      resp = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body,
        signal: AbortSignal.timeout(Math.max(1, Math.ceil(options.timeoutMs))),
      });
      text = await resp.text();
    } catch (err: unknown) {
      if (this.debug) {
        console.error(`${method} ${url} -> failed`);
      }
      throw new DatastoreError(`Network error on ${method} ${url}: ${describeCause(err)}`, { cause: err });
    }

    if (this.debug) {
      console.error(`${method} ${url} -> ${resp.status}`);
    }
    return { status: resp.status, headers: resp.headers, text };
  }
}
