/**
 * Exceptions are reserved for collaborator failures and bad configuration.
 * Trade rejections travel as values on TradeDecision, never as errors.
 */

export class EngineError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INVALID_CONFIG", 500, options);
  }
}

export class OrderPlacementError extends EngineError {
  constructor(
    readonly symbol: string,
    options?: { cause?: unknown },
  ) {
    super(`Order placement failed for ${symbol}: ${describeCause(options?.cause)}`, "ORDER_FAILED", 502, options);
  }
}

export class OrderTimeoutError extends EngineError {
  constructor(
    readonly symbol: string,
    readonly timeoutMs: number,
  ) {
    super(`Order placement for ${symbol} timed out after ${timeoutMs}ms`, "ORDER_TIMEOUT", 504);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? "unknown error" : String(cause);
}

export function toLogError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }
  try {
    return { message: JSON.stringify(err) };
  } catch {
    return { message: String(err) };
  }
}
