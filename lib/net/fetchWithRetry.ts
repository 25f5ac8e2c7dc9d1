import pLimit from 'p-limit';
import { CONFIG } from '../config';
import logger from '../logger';
import { withTimeout } from './timeout';
import { TimeoutError } from '../errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const hostLimitMap = new Map<string, ReturnType<typeof pLimit>>();

function getHostFromUrl(url: string): string {
  try {
    const u = new URL(url);
    return u.host;
  } catch {
    return 'default';
  }
}

function getLimitForHost(host: string) {
  let limit = hostLimitMap.get(host);
  if (!limit) {
    limit = pLimit(CONFIG.HTTP.POOL_SIZE);
    hostLimitMap.set(host, limit);
  }
  return limit;
}

export interface FetchRetryOptions {
  retries?: number; // total attempts
  backoffMs?: number; // base backoff
  timeoutMs?: number; // per-request timeout
  fetchImpl?: FetchLike;
}

/** Status and headers of the final response, with its body already read. */
export interface FetchedText {
  status: number;
  ok: boolean;
  headers: Headers;
  body: string;
}

type RetryConfig = { retries: number; base: number; timeoutMs: number; fetchImpl: FetchLike };

function resolveConfig(opts?: FetchRetryOptions): RetryConfig {
  return {
    retries: opts?.retries ?? 1 + CONFIG.HTTP.MAX_RETRIES,
    base: opts?.backoffMs ?? CONFIG.HTTP.BACKOFF_MS,
    timeoutMs: opts?.timeoutMs ?? CONFIG.HTTP.TIMEOUT_MS,
    fetchImpl: opts?.fetchImpl ?? runtimeFetch,
  };
}

/** Resolves with the response once its headers arrive. */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<Response> {
  const limit = getLimitForHost(getHostFromUrl(url));
  return limit(() => execWithRetry(url, init, resolveConfig(opts), async (res) => res));
}

/** Like `fetchWithRetry`, but each attempt's timeout also covers reading the body. */
export async function fetchTextWithRetry(
  url: string,
  init?: RequestInit,
  opts?: FetchRetryOptions,
): Promise<FetchedText> {
  const limit = getLimitForHost(getHostFromUrl(url));
  return limit(() =>
    execWithRetry(url, init, resolveConfig(opts), async (res) => ({
      status: res.status,
      ok: res.ok,
      headers: res.headers,
      body: await res.text(),
    })),
  );
}

// Resolved per call so a fetch stubbed onto globalThis in tests is picked up.
function runtimeFetch(input: string, init?: RequestInit): Promise<Response> {
  if (typeof globalThis.fetch !== 'function') {
    throw new Error('fetch is not available in this runtime. Node 18+ provides a global fetch');
  }
  return globalThis.fetch(input, init);
}

type Attempt<T> = { retry: false; value: T } | { retry: true; res: Response };

async function execWithRetry<T>(
  url: string,
  init: RequestInit | undefined,
  cfg: RetryConfig,
  consume: (res: Response) => Promise<T>,
): Promise<T> {
  let attempt = 0;
  while (true) {
    attempt++;
    const last = attempt >= cfg.retries;
    const controller = new AbortController();
    const run = async (): Promise<Attempt<T>> => {
      const res = await cfg.fetchImpl(url, { ...(init || {}), signal: controller.signal });
      if (!last && (res.status === 429 || res.status >= 500)) return { retry: true, res };
      return { retry: false, value: await consume(res) };
    };

    let outcome: Attempt<T>;
    try {
      outcome = await withTimeout(run(), cfg.timeoutMs, url);
    } catch (err) {
      controller.abort();
      if (err instanceof TimeoutError || (err instanceof Error && err.name === 'AbortError')) {
        logger.debug({ url, attempt }, 'fetchWithRetry request timed out');
      } else {
        logger.debug({ url, attempt, err }, 'fetchWithRetry network error');
      }
      if (last) throw err;
      await delayMs(cfg.base * Math.pow(2, attempt - 1));
      continue;
    }

    if (!outcome.retry) return outcome.value;
    const { res } = outcome;
    if (res.status === 429) {
      // rate limited - respect Retry-After if present, never longer than one request timeout
      const ra = res.headers.get('retry-after');
      const delay = Math.min(ra ? parseRetryAfter(ra) : cfg.base * Math.pow(2, attempt - 1), cfg.timeoutMs);
      logger.debug({ url, attempt, status: res.status, delay }, 'fetchWithRetry received 429, backing off');
      await delayMs(delay);
    } else {
      const delay = cfg.base * Math.pow(2, attempt - 1);
      logger.debug({ url, attempt, status: res.status, delay }, 'fetchWithRetry received 5xx, retrying');
      await delayMs(delay);
    }
  }
}

function delayMs(ms: number) {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}

function parseRetryAfter(val: string): number {
  // If numeric -> seconds
  const n = Number(val);
  if (!Number.isNaN(n)) return n * 1000;
  // Attempt to parse HTTP-date
  const t = Date.parse(val);
  if (!Number.isNaN(t)) return Math.max(0, t - Date.now());
  return 1000;
}
