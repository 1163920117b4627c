export class HttpError extends Error {
  status: number;

  code: string;

  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const badRequestError = (message: string, details?: unknown): HttpError =>
  new HttpError(400, 'BAD_REQUEST', message, details);

export const notFoundError = (message: string): HttpError =>
  new HttpError(404, 'NOT_FOUND', message);

export const unauthorizedError = (message = 'Unauthorized'): HttpError =>
  new HttpError(401, 'UNAUTHORIZED', message);

export const serviceUnavailableError = (message: string, details?: unknown): HttpError =>
  new HttpError(503, 'SERVICE_UNAVAILABLE', message, details);

/**
 * Base class for failures talking to the vehicle API. `status` is the upstream HTTP
 * status when there was one.
 */
export class UpstreamError extends Error {
  status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/** The refresh token was rejected. Polling cannot continue until an operator intervenes. */
export class AuthError extends UpstreamError {}

export class TransientAuthError extends UpstreamError {}

export class TransientNetworkError extends UpstreamError {}

/** Upstream answered 401 to a data call: the access token is no longer accepted. */
export class UnauthorizedError extends UpstreamError {}

/** Upstream answered 408: the vehicle is asleep or offline. */
export class VehicleUnavailableError extends UpstreamError {}

export class DecodeError extends UpstreamError {}

/**
 * Deferral signal, not a failure. Raised for upstream 429 responses and carried back to
 * the scheduler so the cycle is retried at `retryAt`.
 */
export class RateLimitExceeded extends UpstreamError {
  retryAt: number;

  constructor(message: string, retryAt: number, status?: number) {
    super(message, status);
    this.retryAt = retryAt;
  }
}
