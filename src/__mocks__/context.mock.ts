import type { ConversationContext } from '../conversation/context.js';
import { InMemoryAssistantsService, type InMemoryOptions } from './assistants-service.mock.js';
import { RecordingLogger } from './logger.mock.js';

export interface TestContext {
  service: InMemoryAssistantsService;
  logger: RecordingLogger;
  context: ConversationContext;
}

/** A context over a fresh in-memory service that polls without delay. */
export function createTestContext(options?: InMemoryOptions): TestContext {
  const service = new InMemoryAssistantsService(options);
  const logger = new RecordingLogger();
  return {
    service,
    logger,
    context: { assistants: service, logger, polling: { pollIntervalMs: 0 } },
  };
}
