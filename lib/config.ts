// Centralized runtime configuration for HTTP, cache TTLs and load concurrency.
// Values are read from env with sane defaults and can be overridden in tests.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

const DAY_MS = 1000 * 60 * 60 * 24;

export const CONFIG = {
  HTTP: {
    TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 15000),
    DELEGATION_TIMEOUT_MS: envInt('DELEGATION_TIMEOUT_MS', 30000),
    MAX_RETRIES: envInt('HTTP_MAX_RETRIES', 1),
    BACKOFF_MS: envInt('HTTP_BACKOFF_MS', 200),
    POOL_SIZE: Math.max(1, envInt('HTTP_POOL_SIZE', 5)),
    USER_AGENT: process.env.USER_AGENT || 'ipv6-stats/1.0',
  },

  TTL: {
    SOURCE_MS: envInt('SOURCE_TTL_MS', DAY_MS * 30),      // 30d
    FALLBACK_MS: envInt('FALLBACK_TTL_MS', 1000 * 60 * 60), // 1h
  },

  LOADING: {
    CONCURRENCY: Math.max(1, envInt('LOAD_CONCURRENCY', 3)),
    TASK_TIMEOUT_MS: envInt('TASK_TIMEOUT_MS', 10000),
  },

  CACHE_MAX_ENTRIES: Math.max(1, envInt('CACHE_MAX_ENTRIES', 500)),
  CACHE_KEY_PREFIX: process.env.CACHE_KEY_PREFIX || 'ipv6stats:v1:',
};

export default CONFIG;
