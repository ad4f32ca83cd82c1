import type { Thread } from '../services/assistants/threads.js';
import type { Message } from '../services/assistants/messages.js';
import type { Run } from '../services/assistants/runs.js';
import type { SortOrder } from '../types/common.js';
import { contextLogger, type ConversationContext, type ThreadRef } from './context.js';
import { resolveRun, type ResolveOptions } from './resolve.js';

export interface SentMessage {
  message: Message;
  run: Run;
}

export interface GetResponseOptions {
  /** `asc` is chronological; `desc` is the service's own default, most recent first. */
  order?: SortOrder;
  /** Only messages after this message id, in the chosen order. */
  after?: string;
  pageSize?: number;
}

/**
 * Appends a user message to `thread` and only then starts a run of
 * `assistantId` on it, returning both. The run sees whatever the thread holds
 * when it is created, so the append must land first.
 */
export async function sendMessage(
  context: ConversationContext,
  assistantId: string,
  thread: ThreadRef,
  text: string
): Promise<SentMessage> {
  const message = await context.assistants.messages.create(thread.id, { role: 'user', content: text });
  const run = await context.assistants.runs.create(thread.id, { assistant_id: assistantId });

  contextLogger(context).debug('Started run', {
    threadId: thread.id,
    messageId: message.id,
    runId: run.id,
    status: run.status,
  });

  return { message, run };
}

export async function submitMessage(
  context: ConversationContext,
  assistantId: string,
  thread: ThreadRef,
  text: string
): Promise<Run> {
  const { run } = await sendMessage(context, assistantId, thread, text);
  return run;
}

/** Opens a new, empty thread and submits `text` on it. */
export async function createThreadAndRun(
  context: ConversationContext,
  assistantId: string,
  text: string
): Promise<{ thread: Thread; run: Run }> {
  const thread = await context.assistants.threads.create();
  const run = await submitMessage(context, assistantId, thread, text);
  return { thread, run };
}

/**
 * Lists every message of `thread`, following pages until the service reports
 * no more. Messages come back in the requested order and are not re-sorted.
 */
export async function getResponse(
  context: ConversationContext,
  thread: ThreadRef,
  options: GetResponseOptions = {}
): Promise<Message[]> {
  const order = options.order ?? 'asc';
  const messages: Message[] = [];
  let after = options.after;

  for (;;) {
    const page = await context.assistants.messages.list(thread.id, { order, after, limit: options.pageSize });
    messages.push(...page.data);

    const cursor = page.last_id ?? page.data[page.data.length - 1]?.id;
    if (!page.has_more || page.data.length === 0 || !cursor) break;
    after = cursor;
  }

  return messages;
}

export interface Exchange {
  thread: Thread;
  run: Run;
  /** The whole thread, oldest first. */
  messages: Message[];
}

/** New conversation: thread, message, run, wait, then the thread's messages. */
export async function ask(
  context: ConversationContext,
  assistantId: string,
  text: string,
  options: ResolveOptions = {}
): Promise<Exchange> {
  const { thread, run } = await createThreadAndRun(context, assistantId, text);
  const finished = await resolveRun(context, run, thread, options);
  const messages = await getResponse(context, thread, { order: 'asc' });
  return { thread, run: finished, messages };
}

export interface FollowUp {
  run: Run;
  /** The new user message followed by the replies it produced, oldest first. */
  messages: Message[];
}

/** Continues an existing thread and returns only what this turn added. */
export async function followUp(
  context: ConversationContext,
  assistantId: string,
  thread: ThreadRef,
  text: string,
  options: ResolveOptions = {}
): Promise<FollowUp> {
  const { message, run } = await sendMessage(context, assistantId, thread, text);
  const finished = await resolveRun(context, run, thread, options);
  const replies = await getResponse(context, thread, { order: 'asc', after: message.id });
  return { run: finished, messages: [message, ...replies] };
}
