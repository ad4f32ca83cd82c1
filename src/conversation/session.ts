import type {
  Assistant,
  AssistantCreateRequest,
  AssistantTool,
  AssistantToolResources,
} from '../services/assistants/types.js';
import type { Thread } from '../services/assistants/threads.js';
import type { Message } from '../services/assistants/messages.js';
import type { Run } from '../services/assistants/runs.js';
import { contextLogger, type ConversationContext, type ThreadRef } from './context.js';
import {
  ask,
  createThreadAndRun,
  followUp,
  getResponse,
  submitMessage,
  type Exchange,
  type FollowUp,
  type GetResponseOptions,
} from './composition.js';
import { resolveRun, type ResolveOptions } from './resolve.js';
import type { ToolRegistry } from './tools.js';

/** How one question of `askAll` ended. */
export type AskOutcome =
  | { status: 'fulfilled'; text: string; exchange: Exchange }
  | { status: 'rejected'; text: string; error: Error };

/**
 * One assistant bound to a context. Threads are not tracked here: every call
 * names the thread it works on, and independent threads can be driven
 * concurrently through the same session.
 */
export class AssistantSession {
  constructor(
    private readonly context: ConversationContext,
    public readonly assistantId: string,
    private readonly tools?: ToolRegistry
  ) {}

  /** Creates the assistant, advertising the registry's functions alongside `request.tools`. */
  static async create(
    context: ConversationContext,
    request: AssistantCreateRequest,
    tools?: ToolRegistry
  ): Promise<AssistantSession> {
    const assistant = await context.assistants.create({
      ...request,
      tools: mergeTools(request.tools ?? [], tools),
    });
    contextLogger(context).info('Created assistant', { assistantId: assistant.id, name: assistant.name });
    return new AssistantSession(context, assistant.id, tools);
  }

  async ask(text: string, options: ResolveOptions = {}): Promise<Exchange> {
    return ask(this.context, this.assistantId, text, this.withTools(options));
  }

  /**
   * Runs each text on its own thread, all at once. Never rejects: a run that
   * fails leaves the other exchanges intact. Outcomes keep the input order.
   */
  async askAll(texts: readonly string[], options: ResolveOptions = {}): Promise<AskOutcome[]> {
    const settled = await Promise.allSettled(texts.map((text) => this.ask(text, options)));
    return settled.map((result, index): AskOutcome => {
      const text = texts[index] ?? '';
      if (result.status === 'fulfilled') {
        return { status: 'fulfilled', text, exchange: result.value };
      }
      const reason: unknown = result.reason;
      return { status: 'rejected', text, error: reason instanceof Error ? reason : new Error(String(reason)) };
    });
  }

  async followUp(thread: ThreadRef, text: string, options: ResolveOptions = {}): Promise<FollowUp> {
    return followUp(this.context, this.assistantId, thread, text, this.withTools(options));
  }

  async submitMessage(thread: ThreadRef, text: string): Promise<Run> {
    return submitMessage(this.context, this.assistantId, thread, text);
  }

  async createThreadAndRun(text: string): Promise<{ thread: Thread; run: Run }> {
    return createThreadAndRun(this.context, this.assistantId, text);
  }

  async resolve(run: Run, thread: ThreadRef, options: ResolveOptions = {}): Promise<Run> {
    return resolveRun(this.context, run, thread, this.withTools(options));
  }

  async getResponse(thread: ThreadRef, options?: GetResponseOptions): Promise<Message[]> {
    return getResponse(this.context, thread, options);
  }

  /**
   * Replaces the assistant's whole tool list (and documents, when given).
   * Functions from the session's registry are always kept on the list.
   */
  async updateTools(tools: AssistantTool[], toolResources?: AssistantToolResources): Promise<Assistant> {
    const request: { tools: AssistantTool[]; tool_resources?: AssistantToolResources } = {
      tools: mergeTools(tools, this.tools),
    };
    if (toolResources) request.tool_resources = toolResources;
    return this.context.assistants.update(this.assistantId, request);
  }

  async refresh(): Promise<Assistant> {
    return this.context.assistants.retrieve(this.assistantId);
  }

  private withTools(options: ResolveOptions): ResolveOptions {
    return this.tools && !options.tools ? { ...options, tools: this.tools } : options;
  }
}

/** Registry functions replace same-named function tools in `tools`. */
export function mergeTools(tools: readonly AssistantTool[], registry?: ToolRegistry): AssistantTool[] {
  if (!registry) return [...tools];
  const registered = registry.definitions();
  const names = new Set(registered.map((tool) => tool.function.name));
  return [
    ...tools.filter((tool) => tool.type !== 'function' || !names.has(tool.function.name)),
    ...registered,
  ];
}
