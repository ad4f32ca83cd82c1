import type { HttpRequest } from '../transport/http-transport.js';
import type { Logger } from '../observability/logging.js';
import { AssistantsError } from '../errors/error.js';

export type RequestHook = (request: HttpRequest, attempt: number) => void | Promise<void>;
export type ResponseHook = <T>(request: HttpRequest, response: T, durationMs: number, attempt: number) => void | Promise<void>;
export type ErrorHook = (request: HttpRequest, error: Error, attempt: number) => void | Promise<void>;
export type RetryHook = (request: HttpRequest, delayMs: number, attempt: number) => void | Promise<void>;

export interface ResilienceHooks {
  onRequest?: RequestHook;
  onResponse?: ResponseHook;
  onError?: ErrorHook;
  onRetry?: RetryHook;
}

export interface LoggingHooksOptions {
  logRequests?: boolean;
  logResponses?: boolean;
  logErrors?: boolean;
  logRetries?: boolean;
}

/** One log line per attempt, outcome and retry. Request bodies are never logged. */
export class LoggingHooks implements ResilienceHooks {
  constructor(
    private readonly logger: Logger,
    private readonly options: LoggingHooksOptions = {}
  ) {}

  onRequest: RequestHook = (request, attempt) => {
    if (this.options.logRequests !== false) {
      this.logger.debug(`${request.method} ${request.path}`, { attempt: attempt + 1 });
    }
  };

  onResponse: ResponseHook = (request, _response, durationMs, attempt) => {
    if (this.options.logResponses !== false) {
      this.logger.debug(`${request.method} ${request.path} completed`, { durationMs, attempt: attempt + 1 });
    }
  };

  onError: ErrorHook = (request, error, attempt) => {
    if (this.options.logErrors === false) return;
    const context: Record<string, unknown> = { attempt: attempt + 1, error: error.name, message: error.message };
    if (error instanceof AssistantsError) {
      if (error.statusCode !== undefined) context['statusCode'] = error.statusCode;
      if (error.requestId !== undefined) context['requestId'] = error.requestId;
    }
    this.logger.warn(`${request.method} ${request.path} failed`, context);
  };

  onRetry: RetryHook = (request, delayMs, attempt) => {
    if (this.options.logRetries !== false) {
      this.logger.info(`Retrying ${request.method} ${request.path}`, { delayMs, nextAttempt: attempt + 2 });
    }
  };
}
