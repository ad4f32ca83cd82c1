import type { HttpRequest, HttpMethod, QueryParams, RequestOptions } from '../types/common.js';
import { InvalidRequestError } from '../errors/categories.js';

export type PathParams = Record<string, string>;

/**
 * Fills `{name}` placeholders in a path template with URI-encoded values.
 * A placeholder without a value is a caller bug and throws.
 */
export function expandPath(template: string, params: PathParams = {}): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new InvalidRequestError(`Missing path parameter "${name}" for ${template}`, { param: name });
    }
    return encodeURIComponent(value);
  });
}

export class RequestBuilder {
  private method: HttpMethod = 'GET';
  private path = '';
  private readonly query: QueryParams = {};
  private headers: Record<string, string> = {};
  private body?: unknown;
  private timeout?: number;
  private signal?: AbortSignal;

  setMethod(method: HttpMethod): this {
    this.method = method;
    return this;
  }

  setPath(template: string, params?: PathParams): this {
    this.path = expandPath(template, params);
    return this;
  }

  /** Merges into the query; undefined values are left out of the request. */
  setQuery(query: QueryParams): this {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) this.query[key] = value;
    }
    return this;
  }

  setHeaders(headers: Record<string, string>): this {
    this.headers = { ...this.headers, ...headers };
    return this;
  }

  setBody(body: unknown): this {
    this.body = body;
    return this;
  }

  setOptions(options: RequestOptions = {}): this {
    const { headers, signal, timeout, idempotencyKey } = options;
    if (headers) this.setHeaders(headers);
    if (idempotencyKey) this.setHeaders({ 'Idempotency-Key': idempotencyKey });
    if (signal) this.signal = signal;
    if (timeout !== undefined) this.timeout = timeout;
    return this;
  }

  build(): HttpRequest {
    const request: HttpRequest = { method: this.method, path: this.path, headers: { ...this.headers } };
    if (Object.keys(this.query).length > 0) request.query = { ...this.query };
    if (this.body !== undefined) request.body = this.body;
    if (this.timeout !== undefined) request.timeout = this.timeout;
    if (this.signal) request.signal = this.signal;
    return request;
  }

  static create(method: HttpMethod = 'GET', template?: string, params?: PathParams): RequestBuilder {
    const builder = new RequestBuilder().setMethod(method);
    return template === undefined ? builder : builder.setPath(template, params);
  }
}
