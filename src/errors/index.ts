export { AssistantsError, type AssistantsErrorOptions } from './error.js';
export {
  TransientRequestError,
  APIConnectionError,
  TimeoutError,
  RequestAbortedError,
  RateLimitError,
  InternalServerError,
  ServiceUnavailableError,
  InvalidRequestError,
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  ConflictError,
  UnprocessableEntityError,
  APIError,
  ConfigurationError,
} from './categories.js';
export {
  TerminalRunError,
  UnhandledToolRequestError,
  RunWaitTimeoutError,
  RunWaitAbortedError,
  ToolExecutionError,
  type TerminalRunStatus,
} from './run-errors.js';
export { mapHttpError } from './mapping.js';
