import { fetchTextWithRetry, FetchedText, FetchLike } from './fetchWithRetry';
import { extractText } from '../html';
import { FetchError, ParseError, TimeoutError } from '../errors';
import { CONFIG } from '../config';

export interface RequestOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * Everything sources need from the network. Any network error, timeout or
 * non-2xx status rejects with `FetchError`; callers own the fallback.
 */
export interface HttpClient {
  getText(url: string, opts?: RequestOptions): Promise<string>;
  getPageText(url: string, opts?: RequestOptions): Promise<string>;
  getJson(url: string, opts?: RequestOptions): Promise<unknown>;
}

export interface HttpClientOptions {
  fetchImpl?: FetchLike;
  userAgent?: string;
  timeoutMs?: number;
  retries?: number;
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const defaultHeaders = {
    'User-Agent': options.userAgent ?? CONFIG.HTTP.USER_AGENT,
    'Accept-Encoding': 'gzip, deflate',
  };

  async function request(url: string, opts?: RequestOptions): Promise<FetchedText> {
    let res: FetchedText;
    try {
      res = await fetchTextWithRetry(
        url,
        { headers: { ...defaultHeaders, ...(opts?.headers ?? {}) } },
        {
          retries: options.retries,
          timeoutMs: opts?.timeoutMs ?? options.timeoutMs ?? CONFIG.HTTP.TIMEOUT_MS,
          fetchImpl: options.fetchImpl,
        },
      );
    } catch (e) {
      const timedOut = e instanceof TimeoutError || (e instanceof Error && e.name === 'AbortError');
      const reason = timedOut ? 'request timed out' : errorMessage(e);
      throw new FetchError(`${reason} (${url})`, url, undefined, { cause: e });
    }
    if (!res.ok) throw new FetchError(`HTTP ${res.status}`, url, res.status);
    return res;
  }

  async function getText(url: string, opts?: RequestOptions): Promise<string> {
    const res = await request(url, opts);
    return res.body;
  }

  async function getPageText(url: string, opts?: RequestOptions): Promise<string> {
    const html = await getText(url, { ...opts, headers: { Accept: 'text/html', ...(opts?.headers ?? {}) } });
    const text = extractText(html);
    if (!text) throw new ParseError(`no readable text extracted from ${url}`);
    return text;
  }

  async function getJson(url: string, opts?: RequestOptions): Promise<unknown> {
    const body = await getText(url, { ...opts, headers: { Accept: 'application/json', ...(opts?.headers ?? {}) } });
    try {
      return JSON.parse(body);
    } catch (e) {
      throw new ParseError(`invalid JSON from ${url}: ${errorMessage(e)}`);
    }
  }

  return { getText, getPageText, getJson };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export default createHttpClient;
