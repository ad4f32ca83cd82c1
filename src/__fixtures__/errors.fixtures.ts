import type { ApiErrorResponse } from '../types/common.js';

export function createApiError(
  message: string,
  type = 'invalid_request_error',
  code: string | null = null
): ApiErrorResponse {
  return { error: { message, type, param: null, code } };
}

export function createJsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', 'x-request-id': 'req_test', ...headers },
  });
}

export function createAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}
