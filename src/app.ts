import express, { type Express } from "express";
import cors from "cors";
import type { AppConfig } from "./config.js";
import { createTravelRouter, type TravelSearchClient } from "./apis/travel.js";
import { requestTimeoutMiddleware } from "./middleware/timeout.js";

export interface AppDeps {
  config: Pick<AppConfig, "allowOrigins" | "defaultCurrency" | "affiliateId" | "domain" | "searchTimeoutMs">;
  client: TravelSearchClient;
  /** Extra fields for /health/deep (cache size, token state). */
  diagnostics?: () => Record<string, unknown>;
}

export function createApp({ config, client, diagnostics }: AppDeps): Express {
  const app = express();

  const origins = config.allowOrigins;
  app.use(
    cors({
      origin: origins.includes("*") ? "*" : origins,
      credentials: !origins.includes("*"),
    }),
  );
  app.use(express.json({ limit: "100kb" }));
  app.use(requestTimeoutMiddleware({ searchTimeoutMs: config.searchTimeoutMs }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.get("/health/deep", (_req, res) => {
    const memUsage = process.memoryUsage();
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      ...diagnostics?.(),
      memory: {
        heapUsedMB: Math.round(memUsage.heapUsed / 1024 / 1024),
        rssMB: Math.round(memUsage.rss / 1024 / 1024),
      },
    });
  });

  app.use(
    createTravelRouter({
      client,
      defaultCurrency: config.defaultCurrency,
      affiliateId: config.affiliateId,
      domain: config.domain,
    }),
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}
