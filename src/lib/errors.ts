/**
 * Error hierarchy for the extraction pipeline. Every error carries a stable
 * `code` and a small context record that ends up in outcome diagnostics.
 */

export class ScraperError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

export type FetchFailureReason =
  | "TIMEOUT"
  | "BLOCKED"
  | "DNS"
  | "HTTP_ERROR"
  | "RENDER_FAILURE";

export class FetchError extends ScraperError {
  public readonly reason: FetchFailureReason;
  public readonly url: string;
  public readonly status?: number;

  constructor(
    reason: FetchFailureReason,
    url: string,
    message: string,
    options: { status?: number; context?: Record<string, unknown> } = {}
  ) {
    super(message, `FETCH_${reason}`, { url, ...options.context });
    this.reason = reason;
    this.url = url;
    this.status = options.status;
  }
}

export type SelectionFailureReason = "NO_STRATEGY" | "MATCHED_EMPTY";

export class SelectionError extends ScraperError {
  public readonly reason: SelectionFailureReason;

  constructor(reason: SelectionFailureReason, message: string, context?: Record<string, unknown>) {
    super(message, reason, context);
    this.reason = reason;
  }
}

export class NormalizationError extends ScraperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "NO_VALID_RECORDS", context);
  }
}

export class ConfigurationError extends ScraperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
