import { setTimeout as delay } from 'node:timers/promises';
import type { HttpTransport, HttpRequest } from '../transport/http-transport.js';
import { AssistantsError } from '../errors/error.js';
import { RateLimitError, RequestAbortedError, ServiceUnavailableError, TransientRequestError } from '../errors/categories.js';
import type { RequestHook, ResponseHook, ErrorHook, RetryHook, ResilienceHooks } from './hooks.js';

export interface ResilienceConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: boolean;
  circuitBreaker: {
    enabled: boolean;
    threshold: number;
    timeoutMs: number;
  };
}

export const DEFAULT_RESILIENCE_CONFIG: ResilienceConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
  jitter: true,
  circuitBreaker: {
    enabled: true,
    threshold: 5,
    timeoutMs: 30000,
  },
};

export type CircuitState = 'closed' | 'open' | 'half-open';

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureTime = 0;

  constructor(
    private readonly threshold: number,
    private readonly timeoutMs: number,
    private readonly now: () => number = Date.now
  ) {}

  canExecute(): boolean {
    switch (this.state) {
      case 'closed':
        return true;
      case 'open':
        if (this.now() - this.lastFailureTime > this.timeoutMs) {
          this.state = 'half-open';
          return true;
        }
        return false;
      case 'half-open':
        return true;
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.state = 'closed';
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open' || this.failureCount >= this.threshold) {
      this.state = 'open';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.lastFailureTime = 0;
  }
}

export interface ResilienceOrchestrator {
  request<T>(request: HttpRequest): Promise<T>;
}

/**
 * Sends requests through the transport, retrying failures that report
 * themselves as retryable with exponential backoff. Retry-After wins over
 * the computed delay. Aborting the request's signal ends the backoff and
 * surfaces the last failure. A caller abort is never retried and never
 * counts against the circuit breaker.
 */
export class DefaultResilienceOrchestrator implements ResilienceOrchestrator {
  private readonly circuitBreaker?: CircuitBreaker;
  private readonly hooks: ResilienceHooks[] = [];

  constructor(
    private readonly transport: HttpTransport,
    private readonly config: ResilienceConfig = DEFAULT_RESILIENCE_CONFIG
  ) {
    const { enabled, threshold, timeoutMs } = config.circuitBreaker;
    if (enabled) {
      this.circuitBreaker = new CircuitBreaker(threshold, timeoutMs);
    }
  }

  addHooks(hooks: ResilienceHooks): this {
    this.hooks.push(hooks);
    return this;
  }

  addRequestHook(onRequest: RequestHook): this {
    return this.addHooks({ onRequest });
  }

  addResponseHook(onResponse: ResponseHook): this {
    return this.addHooks({ onResponse });
  }

  addErrorHook(onError: ErrorHook): this {
    return this.addHooks({ onError });
  }

  addRetryHook(onRetry: RetryHook): this {
    return this.addHooks({ onRetry });
  }

  getCircuitState(): CircuitState | undefined {
    return this.circuitBreaker?.getState();
  }

  async request<T>(request: HttpRequest): Promise<T> {
    this.checkCircuitBreaker();

    for (let attempt = 0; ; attempt++) {
      await this.notify((hooks) => hooks.onRequest?.(request, attempt));
      if (request.signal?.aborted) {
        throw new RequestAbortedError();
      }
      const startTime = Date.now();

      let result: T;
      try {
        result = await this.transport.request<T>(request);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        if (failure instanceof TransientRequestError) {
          this.circuitBreaker?.recordFailure();
        }
        await this.notify((hooks) => hooks.onError?.(request, failure, attempt));

        if (!this.isRetryable(failure) || attempt >= this.config.maxRetries) {
          throw failure;
        }

        const delayMs = this.calculateDelay(attempt, failure);
        await this.notify((hooks) => hooks.onRetry?.(request, delayMs, attempt));
        await this.backoff(delayMs, request.signal, failure);
        continue;
      }

      this.circuitBreaker?.recordSuccess();
      const durationMs = Date.now() - startTime;
      await this.notify((hooks) => hooks.onResponse?.(request, result, durationMs, attempt));
      return result;
    }
  }

  private checkCircuitBreaker(): void {
    if (this.circuitBreaker && !this.circuitBreaker.canExecute()) {
      throw new ServiceUnavailableError('Circuit breaker is open', 503);
    }
  }

  private isRetryable(error: Error): boolean {
    return error instanceof AssistantsError && error.retryable;
  }

  private calculateDelay(attempt: number, error: Error): number {
    if (error instanceof RateLimitError && error.retryAfter) {
      return error.retryAfter * 1000;
    }

    const { initialDelayMs, multiplier, maxDelayMs, jitter } = this.config;
    const capped = Math.min(initialDelayMs * Math.pow(multiplier, attempt), maxDelayMs);
    const spread = jitter ? capped * 0.5 * (Math.random() - 0.5) : 0;
    return Math.round(capped + spread);
  }

  private async backoff(ms: number, signal: AbortSignal | undefined, failure: Error): Promise<void> {
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) throw failure;
      throw error;
    }
  }

  private async notify(call: (hooks: ResilienceHooks) => void | Promise<void>): Promise<void> {
    for (const hooks of this.hooks) {
      await call(hooks);
    }
  }
}

export function createResilienceOrchestrator(
  transport: HttpTransport,
  config?: Partial<ResilienceConfig>
): DefaultResilienceOrchestrator {
  return new DefaultResilienceOrchestrator(transport, {
    ...DEFAULT_RESILIENCE_CONFIG,
    ...config,
  });
}
