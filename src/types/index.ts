export type {
  RequestOptions,
  SortOrder,
  PaginationParams,
  PaginatedResponse,
  ApiError,
  ApiErrorResponse,
  HttpMethod,
  HttpRequest,
  QueryParams,
} from './common.js';
