import { AppError, ErrorBody } from "./AppError";

/**
 * HTTP-level errors
 *
 * These map to HTTP status codes
 */

export class HttpError extends AppError {
  constructor(
    message: string,
    public readonly statusCode: number,
    code: string,
  ) {
    super(message, code);
    this.name = "HttpError";
  }

  toJSON(): ErrorBody {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(message, 400, "BAD_REQUEST");
    this.name = "BadRequestError";
  }
}

export class NotFoundError extends HttpError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class TooManyRequestsError extends HttpError {
  constructor(message = "Too many requests") {
    super(message, 429, "TOO_MANY_REQUESTS");
    this.name = "TooManyRequestsError";
  }
}

export class InternalServerError extends HttpError {
  constructor(message = "Internal server error") {
    super(message, 500, "INTERNAL_SERVER_ERROR");
    this.name = "InternalServerError";
  }
}

export class BadGatewayError extends HttpError {
  constructor(message = "Upstream model returned an error") {
    super(message, 502, "BAD_GATEWAY");
    this.name = "BadGatewayError";
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message = "Service temporarily unavailable") {
    super(message, 503, "SERVICE_UNAVAILABLE");
    this.name = "ServiceUnavailableError";
  }
}

export class GatewayTimeoutError extends HttpError {
  constructor(message = "Upstream model timed out") {
    super(message, 504, "GATEWAY_TIMEOUT");
    this.name = "GatewayTimeoutError";
  }
}
