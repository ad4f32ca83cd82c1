import { AssistantsError, type AssistantsErrorOptions } from './error.js';

/**
 * Failure of a single request that may succeed if sent again: network
 * failures, timeouts, rate limiting and 5xx responses. The resilience
 * orchestrator retries these; everything else is surfaced immediately.
 */
export class TransientRequestError extends AssistantsError {
  constructor(options: AssistantsErrorOptions) {
    super(options);
  }

  override get retryable(): boolean {
    return true;
  }
}

export class APIConnectionError extends TransientRequestError {
  constructor(message: string, options?: { cause?: Error }) {
    super({ message, cause: options?.cause });
  }
}

export class TimeoutError extends TransientRequestError {
  constructor(message: string = 'Request timed out') {
    super({ message });
  }
}

/** The caller aborted the request through its signal. Never retried. */
export class RequestAbortedError extends AssistantsError {
  constructor(message: string = 'Request aborted') {
    super({ message });
  }
}

export class RateLimitError extends TransientRequestError {
  public readonly retryAfter?: number;

  constructor(message: string, options?: { retryAfter?: number; requestId?: string }) {
    super({ message, statusCode: 429, requestId: options?.requestId });
    this.retryAfter = options?.retryAfter;
  }
}

export class InternalServerError extends TransientRequestError {
  constructor(message: string, options?: { requestId?: string }) {
    super({ message, statusCode: 500, ...options });
  }
}

export class ServiceUnavailableError extends TransientRequestError {
  constructor(message: string, statusCode: number, options?: { type?: string; code?: string; requestId?: string }) {
    super({ message, statusCode, ...options });
  }
}

export class InvalidRequestError extends AssistantsError {
  constructor(message: string, options?: { param?: string; code?: string; requestId?: string }) {
    super({ message, statusCode: 400, ...options });
  }
}

export class AuthenticationError extends AssistantsError {
  constructor(message: string, options?: { code?: string; requestId?: string }) {
    super({ message, statusCode: 401, ...options });
  }
}

export class PermissionDeniedError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super({ message, statusCode: 403, ...options });
  }
}

export class NotFoundError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super({ message, statusCode: 404, ...options });
  }
}

export class ConflictError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super({ message, statusCode: 409, ...options });
  }
}

export class UnprocessableEntityError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super({ message, statusCode: 422, ...options });
  }
}

export class APIError extends AssistantsError {
  constructor(message: string, statusCode?: number, options?: { type?: string; code?: string; requestId?: string }) {
    super({ message, statusCode, ...options });
  }
}

export class ConfigurationError extends AssistantsError {
  constructor(message: string) {
    super({ message });
  }
}
