import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, isLogLevel, isSensitiveKey } from '../logging.js';

describe('ConsoleLogger', () => {
  it('should drop messages below the configured level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'warn', includeTimestamps: false });

    logger.info('Polled run');
    logger.warn('Run ended without completing', { runId: 'run_1', status: 'failed' });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] Run ended without completing {"runId":"run_1","status":"failed"}');
  });

  it('should redact key-like context values', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'debug', includeTimestamps: false });

    logger.debug('Sending request', { authorization: 'Bearer test-secret', nested: { apiKey: 'test-secret', path: '/threads' } });

    expect(debug).toHaveBeenCalledWith(
      '[DEBUG] Sending request {"authorization":"[REDACTED]","nested":{"apiKey":"[REDACTED]","path":"/threads"}}'
    );
  });

  it('should log token usage counts and redact token values', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'debug', includeTimestamps: false });

    logger.debug('Run usage', {
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
      access_token: 'test-token',
      clientSecret: 'test-secret',
    });

    expect(debug).toHaveBeenCalledWith(
      '[DEBUG] Run usage {"usage":{"prompt_tokens":12,"completion_tokens":3,"total_tokens":15},"access_token":"[REDACTED]","clientSecret":"[REDACTED]"}'
    );
  });

  it('should write nothing when off', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new ConsoleLogger({ level: 'off' }).error('Connection failed');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(['trace', 'info', 'off', 'verbose'].map(isLogLevel)).toEqual([true, true, true, false]);
  });
});

describe('isSensitiveKey', () => {
  it('should match whole key words only', () => {
    const keys = ['token', 'accessToken', 'x-api-key', 'api_key', 'Authorization', 'total_tokens', 'max_prompt_tokens', 'token_count'];
    expect(keys.map(isSensitiveKey)).toEqual([true, true, true, true, true, false, false, false]);
  });
});
