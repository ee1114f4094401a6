import type { ErrorCode } from "@keyrelay/shared";

export interface ApiErrorOptions {
  headers?: Record<string, string>;
  details?: Record<string, unknown>;
}

/**
 * A failure with a stable machine-readable code. The error handler turns it
 * into `{ error, code, ...details }` and copies `headers` onto the reply.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly headers: Record<string, string>;
  readonly details: Record<string, unknown>;

  constructor(
    statusCode: number,
    code: ErrorCode,
    message: string,
    options: ApiErrorOptions = {}
  ) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.headers = options.headers ?? {};
    this.details = options.details ?? {};
  }
}

export const badRequest = (
  code: ErrorCode,
  message: string,
  options?: ApiErrorOptions
) => new ApiError(400, code, message, options);

export const forbidden = (
  code: ErrorCode,
  message: string,
  options?: ApiErrorOptions
) => new ApiError(403, code, message, options);

export const notFound = (message: string, code: ErrorCode = "NOT_FOUND") =>
  new ApiError(404, code, message);

export const conflict = (
  code: ErrorCode,
  message: string,
  options?: ApiErrorOptions
) => new ApiError(409, code, message, options);

export const gone = (code: ErrorCode, message: string) =>
  new ApiError(410, code, message);

export const payloadTooLarge = (code: ErrorCode, message: string) =>
  new ApiError(413, code, message);

export const serviceUnavailable = (code: ErrorCode, message: string) =>
  new ApiError(503, code, message);

export function tooManyRequests(
  message: string,
  limit: number,
  retryAfter: number
) {
  return new ApiError(429, "RATE_LIMITED", message, {
    headers: {
      "X-RateLimit-Limit": String(limit),
      "X-RateLimit-Remaining": "0",
      "Retry-After": String(retryAfter),
    },
    details: { limit, remaining: 0, retryAfter },
  });
}
