export class LogshipError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LogshipError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Transport-level failure: refused, reset, timeout, closed mid-handshake. */
export class ConnectionError extends LogshipError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONNECTION", options);
    this.name = "ConnectionError";
  }
}

/** A packet the wire format cannot carry, or a malformed frame. */
export class ProtocolError extends LogshipError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROTOCOL", options);
    this.name = "ProtocolError";
  }
}

/** Malformed connection descriptor, bad option value or unresolved variable. */
export class ConfigurationError extends LogshipError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

export class QueueOverflowError extends LogshipError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "QUEUE_OVERFLOW", options);
    this.name = "QueueOverflowError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to LogshipError (preserves cause chain). */
export function toLogshipError(value: unknown): LogshipError {
  if (value instanceof LogshipError) return value;
  if (value instanceof Error) return new LogshipError(value.message, "UNKNOWN", { cause: value });
  return new LogshipError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Wrap an unknown failure as a ConnectionError unless it already is one. */
export function toConnectionError(value: unknown, context?: string): ConnectionError {
  if (value instanceof ConnectionError) return value;
  const message = context ? `${context}: ${errorMessage(value)}` : errorMessage(value);
  return new ConnectionError(message, { cause: value });
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
