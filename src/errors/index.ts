/**
 * Caller-facing errors. Anything thrown that is not a GatewayError is treated
 * as an internal failure by the error handler and never shown to the caller.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends GatewayError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class MissingArgumentError extends BadRequestError {
  constructor(public readonly argument: string) {
    super(`Missing query argument ${argument}`);
  }
}

export class SuperfluousArgumentError extends BadRequestError {
  constructor(public readonly value: string) {
    super(`Superfluous query argument ${JSON.stringify(value)}`);
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(message = 'Unauthorized') {
    super(message, 401);
  }
}

export class ForbiddenError extends GatewayError {
  constructor(message = 'Forbidden') {
    super(message, 403);
  }
}

export class NotFoundError extends GatewayError {
  constructor(message = 'Not Found') {
    super(message, 404);
  }
}

export class RateLimitedError extends GatewayError {
  constructor(message = 'Too Many Requests') {
    super(message, 429);
  }
}

export class UpstreamError extends GatewayError {
  constructor(message = 'Failed to request upstream') {
    super(message, 502);
  }
}
