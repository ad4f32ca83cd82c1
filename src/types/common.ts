export interface RequestOptions {
  timeout?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  idempotencyKey?: string;
}

export type SortOrder = 'asc' | 'desc';

export interface PaginationParams {
  limit?: number;
  after?: string;
  before?: string;
  order?: SortOrder;
}

export interface PaginatedResponse<T> {
  data: T[];
  object: 'list';
  first_id?: string | null;
  last_id?: string | null;
  has_more: boolean;
}

export interface ApiError {
  message: string;
  type: string;
  param?: string | null;
  code?: string | null;
}

export interface ApiErrorResponse {
  error: ApiError;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  body?: unknown;
  timeout?: number;
  signal?: AbortSignal;
}
