export type { ConversationContext, ThreadRef } from './context.js';
export type { WaitOptions } from './waiter.js';
export { waitOnRun, isPending, DEFAULT_POLL_INTERVAL_MS, DEFAULT_PENDING_STATUSES } from './waiter.js';
export type { ResolveOptions } from './resolve.js';
export { resolveRun } from './resolve.js';
export type { ToolDefinition, ToolHandler } from './tools.js';
export { ToolRegistry, serializeOutput } from './tools.js';
export type { SentMessage, GetResponseOptions, Exchange, FollowUp } from './composition.js';
export {
  sendMessage,
  submitMessage,
  createThreadAndRun,
  getResponse,
  ask,
  followUp,
} from './composition.js';
export type { LineWriter } from './format.js';
export { messageText, formatMessages, prettyPrint, formatJson, showJson } from './format.js';
export type { AskOutcome } from './session.js';
export { AssistantSession, mergeTools } from './session.js';
