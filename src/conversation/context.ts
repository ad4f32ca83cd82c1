import type { AssistantsService } from '../services/assistants/service.js';
import type { Thread } from '../services/assistants/threads.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { WaitOptions } from './waiter.js';

/** Everything a composition helper needs. */
export interface ConversationContext {
  assistants: AssistantsService;
  logger?: Logger;
  /** Defaults for every wait started through this context. */
  polling?: WaitOptions;
}

/** Only the id of a thread is needed to address it. */
export type ThreadRef = Pick<Thread, 'id'>;

const NOOP_LOGGER = new NoopLogger();

export function contextLogger(context: ConversationContext): Logger {
  return context.logger ?? NOOP_LOGGER;
}
