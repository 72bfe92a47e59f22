import type { Server } from "http";
import { config } from "./config.js";
import { createApp } from "./app.js";
import { TTLCache } from "./lib/cache.js";
import { RetryExecutor } from "./lib/retry.js";
import { TokenStore } from "./lib/token-store.js";
import { AmadeusClient, ENDPOINTS } from "./providers/amadeus.js";

// --- Upstream access (one instance of each for the life of the process) ---

const tokens = new TokenStore({
  tokenUrl: `${config.amadeus.baseUrl}${ENDPOINTS.token}`,
  clientId: config.amadeus.clientId,
  clientSecret: config.amadeus.clientSecret,
  timeoutMs: config.tokenTimeoutMs,
});

const cache = new TTLCache<unknown>({
  ttlMs: config.cache.ttlSeconds * 1000,
  capacity: config.cache.capacity,
});

const retry = new RetryExecutor({
  maxAttempts: config.retry.maxAttempts,
  baseDelayMs: config.retry.baseDelayMs,
  timeoutMs: config.retry.timeoutMs,
  label: "amadeus",
});

const client = new AmadeusClient({
  baseUrl: config.amadeus.baseUrl,
  tokens,
  cache,
  retry,
  cacheTtlMs: config.cache.ttlSeconds * 1000,
});

const app = createApp({
  config,
  client,
  diagnostics: () => ({
    cache: { size: cache.size, capacity: cache.capacity },
    token: tokens.status(),
  }),
});

// --- Start ---
let server: Server;
let pruneTimer: ReturnType<typeof setInterval> | null = null;

function main() {
  console.log("Initializing travel search gateway...");
  console.log(`  Environment: ${config.nodeEnv}`);
  console.log(`  Amadeus base URL: ${config.amadeus.baseUrl}`);
  console.log(`  Search deadline: ${config.searchTimeoutMs}ms`);
  if (!config.amadeus.clientId || !config.amadeus.clientSecret) {
    console.warn("[amadeus] client ID/secret missing; searches will fail until they are set");
  }

  pruneTimer = setInterval(() => {
    const removed = cache.prune();
    if (removed > 0) console.log(`[cache] pruned ${removed} expired entries (size=${cache.size})`);
  }, config.cache.pruneIntervalMs);
  pruneTimer.unref();

  server = app.listen(config.port, () => {
    console.log(`\nTravel search gateway running on http://localhost:${config.port}`);
    console.log(`  Health: http://localhost:${config.port}/health`);
    console.log(`  Flights: http://localhost:${config.port}/api/search/flights`);
    console.log(`  Hotels: http://localhost:${config.port}/api/search/hotels`);
  });
}

// --- Graceful shutdown ---
function shutdown(signal: string) {
  console.log(`\n${signal} received, shutting down...`);
  if (pruneTimer) clearInterval(pruneTimer);

  if (!server) process.exit(0);
  server.close((err) => {
    if (err) console.error("  HTTP server close error:", err.message);
    else console.log("  HTTP server closed");
    process.exit(err ? 1 : 0);
  });

  // In-flight requests get 10 seconds to complete.
  setTimeout(() => {
    console.error("  Forcing exit after 10s");
    process.exit(1);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

main();
