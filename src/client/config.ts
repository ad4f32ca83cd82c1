/**
 * Client configuration.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';
import { isLogLevel, type Logger, type LogLevel } from '../observability/logging.js';
import { DEFAULT_POLL_INTERVAL_MS } from '../conversation/waiter.js';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

export interface AssistantsConfig {
  apiKey: string;
  baseUrl?: string;
  organizationId?: string;
  projectId?: string;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  maxRetries?: number;
  /** Initial retry backoff in milliseconds. */
  retryDelay?: number;
  /** Delay between run polls. */
  pollIntervalMs?: number;
  /** Give up waiting on a run after this long. Unbounded when unset. */
  maxWaitMs?: number;
  logLevel?: LogLevel;
  /** Replaces the console logger built from `logLevel`. */
  logger?: Logger;
}

export interface NormalizedConfig {
  apiKey: string;
  baseUrl: string;
  organizationId?: string;
  projectId?: string;
  timeout: number;
  maxRetries: number;
  retryDelay: number;
  pollIntervalMs: number;
  maxWaitMs?: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Omit<NormalizedConfig, 'apiKey'> = {
  baseUrl: DEFAULT_BASE_URL,
  timeout: 60000,
  maxRetries: 3,
  retryDelay: 1000,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  logLevel: 'warn',
};

const configSchema = z.object({
  apiKey: z.string().trim().min(1, 'API key is required'),
  baseUrl: z.string().url().optional(),
  organizationId: z.string().min(1).optional(),
  projectId: z.string().min(1).optional(),
  timeout: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().max(10).optional(),
  retryDelay: z.number().int().nonnegative().optional(),
  pollIntervalMs: z.number().int().nonnegative().optional(),
  maxWaitMs: z.number().int().positive().optional(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'off']).optional(),
});

/**
 * Validates a configuration.
 * @throws {ConfigurationError} listing every invalid field
 */
export function validateConfig(config: AssistantsConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`);
  }
}

export function normalizeConfig(config: AssistantsConfig): NormalizedConfig {
  const normalized: NormalizedConfig = {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl ?? DEFAULT_CONFIG.baseUrl,
    timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
    retryDelay: config.retryDelay ?? DEFAULT_CONFIG.retryDelay,
    pollIntervalMs: config.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs,
    logLevel: config.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
  if (config.organizationId) normalized.organizationId = config.organizationId;
  if (config.projectId) normalized.projectId = config.projectId;
  if (config.maxWaitMs !== undefined) normalized.maxWaitMs = config.maxWaitMs;
  return normalized;
}

/**
 * Reads configuration from environment variables.
 * @throws {ConfigurationError} when OPENAI_API_KEY is missing or a value cannot be parsed
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AssistantsConfig {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY environment variable is not set');
  }

  const config: AssistantsConfig = { apiKey };
  if (env.OPENAI_BASE_URL) config.baseUrl = env.OPENAI_BASE_URL;
  if (env.OPENAI_ORG_ID) config.organizationId = env.OPENAI_ORG_ID;
  if (env.OPENAI_PROJECT_ID) config.projectId = env.OPENAI_PROJECT_ID;

  const pollInterval = env.ASSISTANTS_POLL_INTERVAL_MS;
  if (pollInterval) {
    const value = Number(pollInterval);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`ASSISTANTS_POLL_INTERVAL_MS must be a number, got "${pollInterval}"`);
    }
    config.pollIntervalMs = value;
  }

  const logLevel = env.ASSISTANTS_LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`ASSISTANTS_LOG_LEVEL must be one of trace, debug, info, warn, error, off; got "${logLevel}"`);
    }
    config.logLevel = logLevel;
  }

  return config;
}
