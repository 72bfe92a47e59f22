/**
 * Error kinds surfaced by the upstream-access layer.
 *
 * Each carries an optional `status` so route handlers can keep using the
 * `err.status` convention for upstream HTTP codes.
 */

export class InvalidArgumentError extends Error {
  readonly status = 500;

  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class AuthenticationError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AuthenticationError";
    this.status = options.status;
  }
}

export class UpstreamError extends Error {
  /** Upstream HTTP status, absent when no response was received. */
  readonly status?: number;
  /** Parsed upstream error body, when there was one. */
  readonly detail?: unknown;
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { status?: number; detail?: unknown; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.status = options.status;
    this.detail = options.detail;
    this.retryable = options.retryable ?? false;
  }
}
