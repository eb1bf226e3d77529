export type ErrorContext = {
  documentId?: string;
  filename?: string;
  format?: string;
  source?: string;
  status?: number;
};

export type ErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "EXTRACTION_FAILED"
  | "EMBEDDING_FAILED"
  | "GENERATION_UNAVAILABLE"
  | "INDEX_UNAVAILABLE";

export class SupportBrainError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(
    code: ErrorCode,
    message: string,
    options: { context?: ErrorContext; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = options.context ?? {};
  }
}

export class UnsupportedFormatError extends SupportBrainError {
  constructor(declaredFormat: string, context: ErrorContext = {}) {
    super("UNSUPPORTED_FORMAT", `Unsupported format: ${declaredFormat || "(none)"}`, {
      context: { ...context, format: declaredFormat }
    });
  }
}

export class ExtractionError extends SupportBrainError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super("EXTRACTION_FAILED", message, options);
  }
}

export class EmbeddingError extends SupportBrainError {
  /** Retryable failures: network, throttling, upstream 5xx, timeouts. */
  readonly transient: boolean;

  constructor(
    message: string,
    options: { transient: boolean; context?: ErrorContext; cause?: unknown }
  ) {
    super("EMBEDDING_FAILED", message, options);
    this.transient = options.transient;
  }
}

export class GenerationUnavailableError extends SupportBrainError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super("GENERATION_UNAVAILABLE", message, options);
  }
}

export class IndexUnavailableError extends SupportBrainError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super("INDEX_UNAVAILABLE", message, options);
  }
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT"
]);

function readProperty(err: unknown, key: string): unknown {
  if (err && typeof err === "object" && key in err) {
    const value: unknown = Reflect.get(err, key);
    return value;
  }
  return undefined;
}

export function errorStatus(err: unknown): number | undefined {
  const status = readProperty(err, "status") ?? readProperty(err, "statusCode");
  return typeof status === "number" ? status : undefined;
}

/**
 * Classifies a raw failure from an external call. Validation-type failures
 * (4xx other than 408/429, unsupported input) are permanent.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof EmbeddingError) return err.transient;
  if (err instanceof SupportBrainError) return false;

  const status = errorStatus(err);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500;
  }

  const code = readProperty(err, "code");
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;

  const name = readProperty(err, "name");
  if (name === "TimeoutError") return true;

  const message = err instanceof Error ? err.message.toLowerCase() : "";
  return (
    message.includes("fetch failed") ||
    message.includes("timed out") ||
    message.includes("socket hang up") ||
    message.includes("rate limit")
  );
}

export function describeError(err: unknown): string {
  if (err instanceof SupportBrainError) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}
