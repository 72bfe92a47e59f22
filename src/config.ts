import "dotenv/config";

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string, fallback: string): string {
  return env[key] || fallback;
}

function int(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`Invalid env var ${key}: expected an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

/** CSV list from env, e.g. ALLOW_ORIGINS=http://a.test,http://b.test */
function csv(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) return fallback;
  return raw.split(",").map((v) => v.trim()).filter(Boolean);
}

/**
 * Deadline for search routes: one token exchange plus every retry attempt
 * timing out, with the backoff between them. Never below 90s.
 */
function searchDeadlineMs(
  tokenTimeoutMs: number,
  retry: { maxAttempts: number; baseDelayMs: number; timeoutMs: number },
): number {
  let backoff = 0;
  for (let attempt = 1; attempt < retry.maxAttempts; attempt++) backoff += retry.baseDelayMs * 2 ** (attempt - 1);
  return Math.max(90_000, tokenTimeoutMs + retry.maxAttempts * retry.timeoutMs + backoff + 5_000);
}

export function loadConfig(env: Env = process.env) {
  const nodeEnv = optional(env, "NODE_ENV", "development");
  const retry = {
    maxAttempts: int(env, "RETRY_MAX_ATTEMPTS", 4, 1),
    baseDelayMs: int(env, "RETRY_BASE_DELAY_MS", 1000),
    timeoutMs: int(env, "UPSTREAM_TIMEOUT_MS", 20_000, 1),
  };
  const tokenTimeoutMs = int(env, "TOKEN_TIMEOUT_MS", 10_000, 1);

  return {
    port: int(env, "PORT", 8000, 1),
    nodeEnv,
    isDev: nodeEnv === "development",

    // Upstream credentials are optional at boot; searches fail with an
    // authentication error until they are set.
    amadeus: {
      clientId: optional(env, "AMADEUS_CLIENT_ID", ""),
      clientSecret: optional(env, "AMADEUS_CLIENT_SECRET", ""),
      baseUrl: optional(env, "AMADEUS_BASE_URL", "https://test.api.amadeus.com").replace(/\/+$/, ""),
    },

    cache: {
      ttlSeconds: int(env, "CACHE_TTL_SECONDS", 60, 1),
      capacity: int(env, "CACHE_CAPACITY", 512, 1),
      pruneIntervalMs: int(env, "CACHE_PRUNE_INTERVAL_MS", 30_000, 1_000),
    },

    retry,
    tokenTimeoutMs,
    searchTimeoutMs: int(env, "SEARCH_TIMEOUT_MS", searchDeadlineMs(tokenTimeoutMs, retry), 1_000),
    defaultCurrency: optional(env, "DEFAULT_CURRENCY", "INR").toUpperCase(),
    allowOrigins: csv(env, "ALLOW_ORIGINS", ["*"]),

    affiliateId: env.AFFILIATE_ID || null,
    domain: env.DOMAIN || null,
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();
