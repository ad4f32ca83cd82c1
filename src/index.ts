export type { AssistantsClient, AssistantsConfig, NormalizedConfig } from './client/index.js';
export {
  AssistantsClientImpl,
  createClient,
  createClientFromEnv,
  configFromEnv,
  validateConfig,
  normalizeConfig,
  DEFAULT_CONFIG,
  DEFAULT_BASE_URL,
} from './client/index.js';

export type {
  RequestOptions,
  SortOrder,
  PaginationParams,
  PaginatedResponse,
  HttpMethod,
  HttpRequest,
  QueryParams,
} from './types/index.js';

export * from './errors/index.js';
export * from './observability/index.js';
export * from './conversation/index.js';
export * from './services/assistants/index.js';
export * from './services/files/index.js';

export type { HttpTransport } from './transport/index.js';
export { FetchHttpTransport, RequestBuilder, createUploadForm } from './transport/index.js';

export type { AuthManager, AuthConfig } from './auth/index.js';
export { BearerAuthManager } from './auth/index.js';

export * from './resilience/index.js';
