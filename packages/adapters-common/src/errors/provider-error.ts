/**
 * Provider error taxonomy.
 *
 * Every provider call fails with a ProviderError whose kind decides how the
 * retry executor treats it. `classifyProviderError` maps SDK errors (gRPC
 * status codes, HTTP status codes, Node network error codes) onto the kinds.
 */

/**
 * Standard error kinds that all providers report
 */
export enum ProviderErrorKind {
  RATE_LIMITED = "RateLimited",
  UNAUTHORIZED = "Unauthorized",
  INVALID_ARGUMENT = "InvalidArgument",
  CONFLICT = "Conflict",
  UNAVAILABLE = "Unavailable",
  UNKNOWN = "Unknown",
}

/**
 * Structured error for provider operations
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "ProviderError";
  }

  /** Whether the failure is transient and worth retrying with backoff */
  get retryable(): boolean {
    return this.kind === ProviderErrorKind.RATE_LIMITED || this.kind === ProviderErrorKind.UNAVAILABLE;
  }
}

// gRPC status codes as returned by google-gax
const GRPC_STATUS_KINDS: Record<number, ProviderErrorKind> = {
  3: ProviderErrorKind.INVALID_ARGUMENT, // INVALID_ARGUMENT
  4: ProviderErrorKind.UNAVAILABLE, // DEADLINE_EXCEEDED
  6: ProviderErrorKind.CONFLICT, // ALREADY_EXISTS
  7: ProviderErrorKind.UNAUTHORIZED, // PERMISSION_DENIED
  8: ProviderErrorKind.RATE_LIMITED, // RESOURCE_EXHAUSTED
  9: ProviderErrorKind.INVALID_ARGUMENT, // FAILED_PRECONDITION
  10: ProviderErrorKind.CONFLICT, // ABORTED
  11: ProviderErrorKind.INVALID_ARGUMENT, // OUT_OF_RANGE
  14: ProviderErrorKind.UNAVAILABLE, // UNAVAILABLE
  16: ProviderErrorKind.UNAUTHORIZED, // UNAUTHENTICATED
};

const HTTP_STATUS_KINDS: Record<number, ProviderErrorKind> = {
  400: ProviderErrorKind.INVALID_ARGUMENT,
  401: ProviderErrorKind.UNAUTHORIZED,
  403: ProviderErrorKind.UNAUTHORIZED,
  409: ProviderErrorKind.CONFLICT,
  412: ProviderErrorKind.CONFLICT,
  429: ProviderErrorKind.RATE_LIMITED,
  500: ProviderErrorKind.UNAVAILABLE,
  502: ProviderErrorKind.UNAVAILABLE,
  503: ProviderErrorKind.UNAVAILABLE,
  504: ProviderErrorKind.UNAVAILABLE,
};

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

const MESSAGE_PATTERNS: Array<[RegExp, ProviderErrorKind]> = [
  [/rate ?limit/i, ProviderErrorKind.RATE_LIMITED],
  // Resource quota (e.g. GPUs per region) does not clear by waiting
  [/quota .*exceeded|QUOTA_EXCEEDED/i, ProviderErrorKind.INVALID_ARGUMENT],
  [/resourceNotReady|is not ready/i, ProviderErrorKind.CONFLICT],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && typeof error.message === "string") return error.message;
  return String(error);
}

/**
 * Numeric status carried by an SDK error: `code` for gRPC errors,
 * `status` or `response.status` for HTTP errors.
 */
function statusCodes(error: Record<string, unknown>): number[] {
  const codes: number[] = [];
  if (typeof error.code === "number") codes.push(error.code);
  if (typeof error.status === "number") codes.push(error.status);
  if (isRecord(error.response) && typeof error.response.status === "number") {
    codes.push(error.response.status);
  }
  return codes;
}

/**
 * Classify any thrown value into a ProviderError.
 * ProviderErrors pass through unchanged.
 */
export function classifyProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = errorMessage(error);

  for (const [pattern, kind] of MESSAGE_PATTERNS) {
    if (pattern.test(message)) {
      return new ProviderError(message, kind, error);
    }
  }

  if (isRecord(error)) {
    if (typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
      return new ProviderError(message, ProviderErrorKind.UNAVAILABLE, error);
    }

    for (const code of statusCodes(error)) {
      const kind = code < 100 ? GRPC_STATUS_KINDS[code] : HTTP_STATUS_KINDS[code];
      if (kind) {
        return new ProviderError(message, kind, error);
      }
    }
  }

  return new ProviderError(message, ProviderErrorKind.UNKNOWN, error);
}

/**
 * Whether an SDK error means the addressed resource does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  if (isRecord(error) && statusCodes(error).some((code) => code === 5 || code === 404)) {
    return true;
  }
  const message = errorMessage(error);
  return message.includes("NOT_FOUND") || message.includes("was not found");
}
