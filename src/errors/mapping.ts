import type { ApiErrorResponse } from '../types/common.js';
import type { AssistantsError } from './error.js';
import {
  AuthenticationError,
  RateLimitError,
  InvalidRequestError,
  NotFoundError,
  PermissionDeniedError,
  ConflictError,
  UnprocessableEntityError,
  APIError,
  InternalServerError,
  ServiceUnavailableError,
} from './categories.js';

export function mapHttpError(
  status: number,
  body: string,
  headers: Headers
): AssistantsError {
  const requestId = headers.get('x-request-id') ?? undefined;
  const retryAfter = parseRetryAfter(headers.get('retry-after'));

  const errorData = parseErrorBody(body);

  const message = errorData?.error.message ?? `HTTP ${status} error`;
  const code = errorData?.error.code ?? undefined;
  const param = errorData?.error.param ?? undefined;
  const type = errorData?.error.type ?? undefined;

  switch (status) {
    case 400: return new InvalidRequestError(message, { param, code, requestId });
    case 401: return new AuthenticationError(message, { code, requestId });
    case 403: return new PermissionDeniedError(message, { requestId });
    case 404: return new NotFoundError(message, { requestId });
    case 409: return new ConflictError(message, { requestId });
    case 422: return new UnprocessableEntityError(message, { requestId });
    case 429: return new RateLimitError(message, { retryAfter, requestId });
    case 500: return new InternalServerError(message, { requestId });
    case 502:
    case 503:
    case 504: return new ServiceUnavailableError(message, status, { type, code, requestId });
    default:
      if (status > 500) {
        return new ServiceUnavailableError(message, status, { type, code, requestId });
      }
      return new APIError(message, status, { type, code, requestId });
  }
}

function parseErrorBody(body: string): ApiErrorResponse | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
    return undefined;
  }
  const error = parsed.error;
  if (typeof error !== 'object' || error === null || !('message' in error) || typeof error.message !== 'string') {
    return undefined;
  }
  return {
    error: {
      message: error.message,
      type: 'type' in error && typeof error.type === 'string' ? error.type : 'unknown',
      code: 'code' in error && typeof error.code === 'string' ? error.code : null,
      param: 'param' in error && typeof error.param === 'string' ? error.param : null,
    },
  };
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = parseInt(value, 10);
  return isNaN(seconds) ? undefined : seconds;
}
