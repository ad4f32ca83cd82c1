import type { NormalizedConfig } from './config.js';
import type { AssistantsService } from '../services/assistants/index.js';
import type { FilesService } from '../services/files/index.js';
import type { ConversationContext } from '../conversation/context.js';
import type { Logger } from '../observability/logging.js';

export interface AssistantsClient {
  readonly assistants: AssistantsService;
  readonly files: FilesService;
  readonly logger: Logger;

  getConfig(): Readonly<NormalizedConfig>;
  /** A conversation context bound to this client's services, logger and polling defaults. */
  context(): ConversationContext;
}

export { AssistantsClientImpl } from './client-impl.js';
export { createClient, createClientFromEnv } from './factory.js';
export { validateConfig, normalizeConfig, configFromEnv, DEFAULT_CONFIG, DEFAULT_BASE_URL } from './config.js';
export type { AssistantsConfig, NormalizedConfig } from './config.js';
