/**
 * Error Classes for codegraph-rag
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_CHUNKING_INVALID = "E1001",
  CONFIG_FILE_UNREADABLE = "E1002",
  CONFIG_MISSING_CREDENTIALS = "E1003",

  // Parse errors (2xxx)
  PARSE_NOT_JSON = "E2000",
  PARSE_SCHEMA_MISMATCH = "E2001",

  // Store errors (3xxx)
  STORE_CONNECTION_FAILED = "E3000",
  STORE_QUERY_FAILED = "E3001",
  STORE_SCHEMA_FAILED = "E3002",
  STORE_UNKNOWN_NODE = "E3003",

  // Vector errors (4xxx)
  VECTOR_DIMENSION_MISMATCH = "E4001",

  // Query errors (5xxx)
  QUERY_EMBEDDING_FAILED = "E5000",
  QUERY_SEARCH_FAILED = "E5001",
  QUERY_INVALID = "E5003",

  // External service errors (6xxx)
  SERVICE_REQUEST_FAILED = "E6000",
  SERVICE_TIMEOUT = "E6001",
  SERVICE_NOT_READY = "E6002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CANCELLED = "E9001",
  FILE_SYSTEM_ERROR = "E9002",
  FILE_NOT_TEXT = "E9003",
}

/**
 * Base error class for all codegraph-rag errors
 */
export class CodeGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CodeGraphError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid engine configuration. Raised before any work is performed.
 */
export class ConfigurationError extends CodeGraphError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.issues = context?.issues ?? [];
  }

  toString(): string {
    const base = super.toString();
    return this.issues.length > 0 ? `${base}\n  - ${this.issues.join("\n  - ")}` : base;
  }
}

/**
 * A completion-service response that is not JSON or does not match the
 * extraction contract.
 */
export class ParseError extends CodeGraphError {
  public readonly raw?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_SCHEMA_MISMATCH,
    context?: Record<string, unknown> & { raw?: string }
  ) {
    super(message, code, context);
    this.name = "ParseError";
    this.raw = context?.raw;
  }
}

/**
 * The graph store could not be reached. Fatal at startup; fails the
 * current operation when it happens mid-run.
 */
export class StoreConnectivityError extends CodeGraphError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, ErrorCode.STORE_CONNECTION_FAILED, context, options);
    this.name = "StoreConnectivityError";
  }
}

/**
 * A store statement failed for a reason other than connectivity.
 */
export class StoreError extends CodeGraphError {
  public readonly query?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORE_QUERY_FAILED,
    context?: Record<string, unknown> & { query?: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "StoreError";
    this.query = context?.query;
  }
}

export class DimensionMismatchError extends CodeGraphError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context?: Record<string, unknown>) {
    super(
      `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
      ErrorCode.VECTOR_DIMENSION_MISMATCH,
      { ...context, expected, actual }
    );
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A hybrid query that could not produce an answer.
 */
export class QueryError extends CodeGraphError {
  public readonly stage?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.QUERY_SEARCH_FAILED,
    context?: Record<string, unknown> & { stage?: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "QueryError";
    this.stage = context?.stage;
  }
}

/**
 * Completion or embedding service failure (transport, quota, timeout).
 */
export class ServiceError extends CodeGraphError {
  public readonly service: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SERVICE_REQUEST_FAILED,
    context: Record<string, unknown> & { service: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "ServiceError";
    this.service = context.service;
  }
}

export class CancelledError extends CodeGraphError {
  constructor(reason = "Operation cancelled") {
    super(reason, ErrorCode.CANCELLED);
    this.name = "CancelledError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isCodeGraphError(error: unknown): error is CodeGraphError {
  return error instanceof CodeGraphError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Render any thrown value as a single line for logs and reports
 */
export function describeError(error: unknown): string {
  if (error instanceof CodeGraphError) return error.toString();
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

// =============================================================================
// Service Failure Classification
// =============================================================================

const TRANSIENT_NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "EAI_AGAIN", "ENOTFOUND"]);

function httpStatusOf(error: object): number | undefined {
  const status: unknown = Reflect.get(error, "status");
  return typeof status === "number" ? status : undefined;
}

/**
 * Whether a failed service request is worth repeating: timeouts, dropped
 * connections, rate limiting and server-side errors. Rejected requests
 * (bad input, bad credentials) fail the same way every time.
 */
export function isTransientServiceFailure(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;

  const status = httpStatusOf(error);
  if (status !== undefined) {
    return status === 408 || status === 409 || status === 429 || status >= 500;
  }

  if (!(error instanceof Error)) return false;
  if (/timeout|timed out|connection/i.test(`${error.name} ${error.message}`)) return true;
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code);
}
