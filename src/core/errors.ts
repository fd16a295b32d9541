// ---------------------------------------------------------------------------
// Error hierarchy for shelfsort.
// ---------------------------------------------------------------------------

import type { ProviderId } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all shelfsort domain errors.
 */
export class ShelfsortError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ShelfsortError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Provider errors ─────────────────────────────────────────────────────────

/**
 * Base class for errors raised while talking to a bibliographic provider.
 */
export class ProviderError extends ShelfsortError {
  public readonly providerId: ProviderId;

  constructor(message: string, providerId: ProviderId, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProviderError";
    this.providerId = providerId;
  }
}

/** The provider could not be reached. */
export class ProviderConnectionError extends ProviderError {
  constructor(message: string, providerId: ProviderId, options?: ErrorOptions) {
    super(message, providerId, options);
    this.name = "ProviderConnectionError";
  }
}

/** The request exceeded its timeout. */
export class ProviderTimeoutError extends ProviderError {
  constructor(message: string, providerId: ProviderId, options?: ErrorOptions) {
    super(message, providerId, options);
    this.name = "ProviderTimeoutError";
  }
}

/** HTTP 429. */
export class ProviderRateLimitError extends ProviderError {
  public readonly retryAfterMs: number | null;

  constructor(
    message: string,
    providerId: ProviderId,
    retryAfterMs: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, providerId, options);
    this.name = "ProviderRateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

/** Any other non-2xx status. 5xx is transient, 4xx is not. */
export class ProviderHttpError extends ProviderError {
  public readonly status: number;

  constructor(
    message: string,
    providerId: ProviderId,
    status: number,
    options?: ErrorOptions,
  ) {
    super(message, providerId, options);
    this.name = "ProviderHttpError";
    this.status = status;
  }

  get isTransient(): boolean {
    return this.status >= 500;
  }
}

/** The response body did not have the expected shape. */
export class ProviderParseError extends ProviderError {
  constructor(message: string, providerId: ProviderId, options?: ErrorOptions) {
    super(message, providerId, options);
    this.name = "ProviderParseError";
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends ShelfsortError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Moving a file into the library failed. */
export class FilingError extends ShelfsortError {
  public readonly sourcePath: string;
  public readonly destinationPath: string;

  constructor(
    sourcePath: string,
    destinationPath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Could not move "${sourcePath}" to "${destinationPath}": ${reason}`, options);
    this.name = "FilingError";
    this.sourcePath = sourcePath;
    this.destinationPath = destinationPath;
  }
}
