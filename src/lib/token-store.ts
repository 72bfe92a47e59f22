import { AuthenticationError } from "./errors.js";
import { isRecord } from "./validation.js";

/** OAuth2 client-credentials token response. */
export interface TokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
}

export interface Token {
  accessToken: string;
  tokenType: string;
  /** Unix timestamp (ms). */
  expiresAt: number;
}

export interface TokenStoreOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  /** Tokens expiring within this window are refreshed before use. */
  safetyMarginMs?: number;
  timeoutMs?: number;
}

const DEFAULT_EXPIRES_IN_S = 1799;

/**
 * Holds the upstream bearer token and refreshes it when stale.
 *
 * Only one credential exchange is ever in flight: callers arriving while a
 * refresh is pending await the same promise.
 */
export class TokenStore {
  private token: Token | null = null;
  private pending: Promise<Token> | null = null;
  private readonly safetyMarginMs: number;
  private readonly timeoutMs: number;

  constructor(private readonly options: TokenStoreOptions) {
    this.safetyMarginMs = options.safetyMarginMs ?? 30_000;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async getValidToken(): Promise<Token> {
    if (this.token && this.token.expiresAt - this.safetyMarginMs > Date.now()) {
      return this.token;
    }
    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Forget the held token. With `accessToken`, only when it is still the
   * held one, so a rejection of an old token cannot drop a fresh one.
   */
  invalidate(accessToken?: string): void {
    if (accessToken !== undefined && this.token?.accessToken !== accessToken) return;
    this.token = null;
  }

  status(): { hasToken: boolean; expiresInMs: number | null } {
    if (!this.token) return { hasToken: false, expiresInMs: null };
    return { hasToken: true, expiresInMs: Math.max(0, this.token.expiresAt - Date.now()) };
  }

  private async exchange(): Promise<Token> {
    const { tokenUrl, clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new AuthenticationError("Upstream credentials are not configured");
    }

    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: clientId,
      client_secret: clientSecret,
    });

    let res: Response;
    try {
      res = await fetch(tokenUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      console.error(`[token] exchange failed: ${err instanceof Error ? err.message : String(err)}`);
      throw new AuthenticationError("Token exchange failed: network error", { cause: err });
    }

    const payload: unknown = await res.json().catch(() => null);

    if (!res.ok) {
      const reason = describeAuthError(payload) ?? (res.statusText || "no reason given");
      console.error(`[token] exchange rejected: status=${res.status} reason=${reason}`);
      throw new AuthenticationError(`Token exchange rejected (${res.status}): ${reason}`, {
        status: res.status,
      });
    }

    const parsed = parseTokenResponse(payload);
    if (!parsed) {
      throw new AuthenticationError("Token exchange returned no access_token", { status: res.status });
    }

    const token: Token = {
      accessToken: parsed.access_token,
      tokenType: parsed.token_type,
      expiresAt: Date.now() + parsed.expires_in * 1000,
    };
    this.token = token;
    console.log(`[token] obtained ${token.tokenType} token, expires_in=${parsed.expires_in}s`);
    return token;
  }
}

function parseTokenResponse(payload: unknown): TokenResponse | null {
  if (!isRecord(payload)) return null;
  const accessToken = payload.access_token;
  if (typeof accessToken !== "string" || accessToken.length === 0) return null;

  const expiresIn = Number(payload.expires_in);
  return {
    access_token: accessToken,
    expires_in: Number.isFinite(expiresIn) && expiresIn > 0 ? expiresIn : DEFAULT_EXPIRES_IN_S,
    token_type: typeof payload.token_type === "string" ? payload.token_type : "Bearer",
  };
}

function describeAuthError(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  for (const field of ["error_description", "error", "title"]) {
    const value = payload[field];
    if (typeof value === "string" && value) return value;
  }
  return undefined;
}
