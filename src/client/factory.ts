import type { AssistantsClient } from './index.js';
import type { AssistantsConfig } from './config.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { AssistantsClientImpl } from './client-impl.js';
import { validateConfig, configFromEnv } from './config.js';

export function createClient(config: AssistantsConfig, transport?: HttpTransport): AssistantsClient {
  validateConfig(config);
  return new AssistantsClientImpl(config, transport);
}

export function createClientFromEnv(env?: NodeJS.ProcessEnv): AssistantsClient {
  return createClient(configFromEnv(env));
}
