// packages/gateway-core/src/errors.ts

export type GatewayErrorCode =
  | "FORBIDDEN"
  | "PAYLOAD_TOO_LARGE"
  | "UNAUTHORIZED"
  | "TOO_MANY_REQUESTS"
  | "ROUTE_NOT_FOUND"
  | "SERVICE_UNAVAILABLE"
  | "NO_HEALTHY_BACKEND"
  | "BACKEND_TIMEOUT"
  | "BACKEND_ERROR"
  | "GATEWAY_ERROR";

/**
 * Base error for everything the gateway refuses or fails on.
 * No HTTP framework types here beyond a status code and headers.
 */
export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GatewayErrorCode,
    message: string,
    status: number,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = options.details;
  }

  /** Extra response headers this error calls for. */
  headers(): Record<string, string> {
    return {};
  }
}

export class ForbiddenError extends GatewayError {
  constructor(message = "Forbidden", details?: Record<string, unknown>) {
    super("FORBIDDEN", message, 403, { details });
  }
}

export class PayloadTooLargeError extends GatewayError {
  constructor(message = "Payload too large", details?: Record<string, unknown>) {
    super("PAYLOAD_TOO_LARGE", message, 413, { details });
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(
    message = "Authentication required",
    private readonly challenge: string = 'Bearer error="invalid_token"'
  ) {
    super("UNAUTHORIZED", message, 401);
  }

  headers(): Record<string, string> {
    return { "WWW-Authenticate": this.challenge };
  }
}

export class TooManyRequestsError extends GatewayError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number, details?: Record<string, unknown>) {
    super("TOO_MANY_REQUESTS", "Rate limit exceeded", 429, {
      details: { ...details, retryAfterMs },
    });
    this.retryAfterMs = retryAfterMs;
  }

  headers(): Record<string, string> {
    return { "Retry-After": String(Math.max(1, Math.ceil(this.retryAfterMs / 1000))) };
  }
}

export class RouteNotFoundError extends GatewayError {
  constructor(path: string) {
    super("ROUTE_NOT_FOUND", `No service is configured for ${path}`, 404);
  }
}

export class ServiceUnavailableError extends GatewayError {
  constructor(service: string) {
    super("SERVICE_UNAVAILABLE", `Service ${service} is temporarily unavailable`, 503, {
      details: { service },
    });
  }
}

export class NoHealthyBackendError extends GatewayError {
  constructor(service: string) {
    super("NO_HEALTHY_BACKEND", `No healthy instance of ${service}`, 503, {
      details: { service },
    });
  }
}

export class BackendTimeoutError extends GatewayError {
  constructor(service: string, timeoutMs: number) {
    super("BACKEND_TIMEOUT", `Service ${service} did not respond within ${timeoutMs}ms`, 504, {
      details: { service, timeoutMs },
    });
  }
}

export class BackendError extends GatewayError {
  constructor(service: string, reason: string, options: { status?: number; cause?: unknown } = {}) {
    super("BACKEND_ERROR", `Service ${service} failed: ${reason}`, 502, {
      details:
        options.status === undefined ? { service } : { service, upstreamStatus: options.status },
      cause: options.cause,
    });
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

/**
 * Anything that is not already a GatewayError becomes GATEWAY_ERROR 500.
 */
export function toGatewayError(err: unknown): GatewayError {
  if (isGatewayError(err)) return err;
  return new GatewayError("GATEWAY_ERROR", "Internal gateway error", 500, { cause: err });
}

export interface GatewayErrorBody {
  ok: false;
  error: {
    code: GatewayErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
}

export interface RenderedError {
  status: number;
  headers: Record<string, string>;
  body: GatewayErrorBody;
}

export function renderGatewayError(err: unknown, requestId?: string): RenderedError {
  const gatewayError = toGatewayError(err);
  return {
    status: gatewayError.status,
    headers: gatewayError.headers(),
    body: {
      ok: false,
      error: {
        code: gatewayError.code,
        message: gatewayError.message,
        ...(gatewayError.details ? { details: gatewayError.details } : {}),
      },
      requestId,
    },
  };
}
