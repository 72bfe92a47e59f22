import type { Request, Response, NextFunction, RequestHandler } from "express";

export interface TimeoutOptions {
  /** Deadline for /api/search/ routes; defaults to 90s. */
  searchTimeoutMs?: number;
}

/**
 * Request timeout middleware.
 * - Search endpoints: `searchTimeoutMs` (sized from the upstream retry budget)
 * - Everything else: 10s
 *
 * Handlers that finish after the 504 must check `res.headersSent`.
 */
export function requestTimeoutMiddleware(options: TimeoutOptions = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const timeout = getTimeoutForPath(req.path, options.searchTimeoutMs);
    const start = Date.now();

    const timer = setTimeout(() => {
      if (!res.headersSent) {
        const elapsed = Date.now() - start;
        console.error(
          `[timeout] Request exceeded ${timeout}ms - aborting`,
          `method=${req.method}`,
          `path=${req.path}`,
          `elapsed=${elapsed}ms`,
        );

        res.status(504).json({
          error: "Request timeout",
          message: `Request exceeded ${timeout / 1000} second limit`,
          retryable: true,
          timeout_ms: timeout,
          elapsed_ms: elapsed,
        });
      }
    }, timeout);

    res.on("finish", () => clearTimeout(timer));
    res.on("close", () => clearTimeout(timer));

    next();
  };
}

export function getTimeoutForPath(path: string, searchTimeoutMs = 90_000): number {
  if (path.startsWith("/api/search/")) {
    return searchTimeoutMs;
  }
  return 10_000;
}
