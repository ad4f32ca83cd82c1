import type { HttpRequest, QueryParams } from '../types/common.js';
import { mapHttpError } from '../errors/mapping.js';
import { AssistantsError } from '../errors/error.js';
import { APIConnectionError, RequestAbortedError, TimeoutError } from '../errors/categories.js';

export type { HttpRequest } from '../types/common.js';

export interface HttpTransport {
  request<T>(request: HttpRequest): Promise<T>;
}

export class FetchHttpTransport implements HttpTransport {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly defaultHeaders: Record<string, string> = {},
    private readonly defaultTimeout: number = 60000
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async request<T>(request: HttpRequest): Promise<T> {
    if (request.signal?.aborted) {
      throw new RequestAbortedError();
    }

    const url = this.buildUrl(request.path, request.query);
    const isMultipart = request.body instanceof FormData;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.defaultHeaders,
      ...request.headers,
    };
    if (isMultipart) {
      // fetch sets the multipart boundary itself
      delete headers['Content-Type'];
    }

    const controller = new AbortController();
    const timeout = request.timeout ?? this.defaultTimeout;
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const onExternalAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: request.method,
        headers,
        body: this.encodeBody(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw mapHttpError(response.status, body, response.headers);
      }

      const text = await response.text();
      const data: unknown = text.length > 0 ? JSON.parse(text) : {};
      // Payload shape is owned by the remote service.
      return data as T;
    } catch (error) {
      if (error instanceof AssistantsError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        if (request.signal?.aborted) throw new RequestAbortedError();
        throw new TimeoutError(`Request timed out after ${timeout}ms`);
      }
      throw new APIConnectionError('Connection failed', {
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }

  private encodeBody(body: unknown): string | FormData | undefined {
    if (body === undefined || body === null) return undefined;
    if (body instanceof FormData) return body;
    return JSON.stringify(body);
  }
}
