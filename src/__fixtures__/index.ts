export {
  createAssistant,
  createThread,
  createMessage,
  createConversation,
  createRun,
  createToolCall,
  createRequiresActionRun,
} from './assistants.fixtures.js';

export { createApiError, createJsonResponse, createAbortError } from './errors.fixtures.js';
