import { describe, it, expect } from 'vitest';
import { configFromEnv, normalizeConfig, validateConfig, DEFAULT_CONFIG } from '../config.js';
import { ConfigurationError } from '../../errors/categories.js';

describe('Client Config', () => {
  describe('validateConfig', () => {
    it('should accept a minimal config', () => {
      expect(() => validateConfig({ apiKey: 'test-secret' })).not.toThrow();
    });

    it('should accept a complete config', () => {
      expect(() =>
        validateConfig({
          apiKey: 'test-secret',
          baseUrl: 'https://proxy.example.test/v1',
          organizationId: 'org-test',
          projectId: 'proj-test',
          timeout: 30000,
          maxRetries: 5,
          retryDelay: 250,
          pollIntervalMs: 1000,
          maxWaitMs: 120000,
          logLevel: 'debug',
        })
      ).not.toThrow();
    });

    it('should reject a blank API key', () => {
      expect(() => validateConfig({ apiKey: '   ' })).toThrow(
        new ConfigurationError('Invalid configuration: apiKey: API key is required')
      );
    });

    it('should list every invalid field', () => {
      expect(() => validateConfig({ apiKey: 'test-secret', timeout: -1, baseUrl: 'not a url' })).toThrow(
        'Invalid configuration: baseUrl: Invalid url, timeout: Number must be greater than 0'
      );
    });

    it('should cap retries at 10', () => {
      expect(() => validateConfig({ apiKey: 'test-secret', maxRetries: 11 })).toThrow(ConfigurationError);
    });
  });

  describe('normalizeConfig', () => {
    it('should fill in defaults', () => {
      expect(normalizeConfig({ apiKey: 'test-secret' })).toEqual({ apiKey: 'test-secret', ...DEFAULT_CONFIG });
    });

    it('should poll every 500ms and log warnings by default', () => {
      expect(DEFAULT_CONFIG).toMatchObject({
        baseUrl: 'https://api.openai.com/v1',
        pollIntervalMs: 500,
        logLevel: 'warn',
        timeout: 60000,
        maxRetries: 3,
      });
    });

    it('should keep values that are set', () => {
      const config = normalizeConfig({ apiKey: 'test-secret', organizationId: 'org-test', maxWaitMs: 5000, pollIntervalMs: 100 });

      expect(config).toMatchObject({ organizationId: 'org-test', maxWaitMs: 5000, pollIntervalMs: 100 });
      expect('projectId' in config).toBe(false);
    });
  });

  describe('configFromEnv', () => {
    it('should read every supported variable', () => {
      const config = configFromEnv({
        OPENAI_API_KEY: 'test-secret',
        OPENAI_BASE_URL: 'https://proxy.example.test/v1',
        OPENAI_ORG_ID: 'org-test',
        OPENAI_PROJECT_ID: 'proj-test',
        ASSISTANTS_POLL_INTERVAL_MS: '250',
        ASSISTANTS_LOG_LEVEL: 'info',
      });

      expect(config).toEqual({
        apiKey: 'test-secret',
        baseUrl: 'https://proxy.example.test/v1',
        organizationId: 'org-test',
        projectId: 'proj-test',
        pollIntervalMs: 250,
        logLevel: 'info',
      });
    });

    it('should require OPENAI_API_KEY', () => {
      expect(() => configFromEnv({})).toThrow('OPENAI_API_KEY environment variable is not set');
    });

    it('should reject an unknown log level', () => {
      expect(() => configFromEnv({ OPENAI_API_KEY: 'test-secret', ASSISTANTS_LOG_LEVEL: 'loud' })).toThrow(
        ConfigurationError
      );
    });

    it('should reject a poll interval that is not a number', () => {
      expect(() => configFromEnv({ OPENAI_API_KEY: 'test-secret', ASSISTANTS_POLL_INTERVAL_MS: 'soon' })).toThrow(
        'ASSISTANTS_POLL_INTERVAL_MS must be a number, got "soon"'
      );
    });
  });
});
