import type {
  AssistantsService,
  MessagesService,
  RunsService,
  ThreadsService,
} from '../services/assistants/service.js';
import type {
  Assistant,
  AssistantCreateRequest,
  AssistantDeleteResponse,
  AssistantListResponse,
  AssistantUpdateRequest,
} from '../services/assistants/types.js';
import type { Thread, ThreadDeleteResponse } from '../services/assistants/threads.js';
import type { Message, MessageListParams, MessageListResponse } from '../services/assistants/messages.js';
import type {
  Run,
  RunError,
  RunRequiredAction,
  RunStatus,
  RunStepListResponse,
  RunToolOutput,
} from '../services/assistants/runs.js';
import { NotFoundError } from '../errors/categories.js';
import { createAssistant, createMessage, createRun, createThread } from '../__fixtures__/assistants.fixtures.js';

/** What a run looks like after one more retrieve. A bare status changes only the status. */
export type RunScriptStep =
  | RunStatus
  | { status: RunStatus; required_action?: RunRequiredAction; last_error?: RunError };

export interface InMemoryOptions {
  /** Statuses reported by successive retrieves of a run. The last one repeats. */
  script?: readonly RunScriptStep[];
  /** The assistant's reply to the latest user message, added when a run completes. */
  reply?: (input: string, run: Run) => string;
}

interface RunState {
  run: Run;
  input: string;
  script: RunScriptStep[];
  replied: boolean;
}

const DEFAULT_SCRIPT: readonly RunScriptStep[] = ['in_progress', 'completed'];

/**
 * Assistants service held in memory. Every call is appended to `calls` as
 * `<area>.<method>:<id>`, object ids count up per kind (`thread_1`, `msg_1`,
 * `run_1`...) and each created object gets a timestamp one second after the
 * previous one.
 */
export class InMemoryAssistantsService implements AssistantsService {
  readonly calls: string[] = [];
  readonly submittedOutputs = new Map<string, RunToolOutput[]>();

  readonly threads: ThreadsService;
  readonly messages: MessagesService;
  readonly runs: RunsService;

  private readonly assistantStore = new Map<string, Assistant>();
  private readonly threadStore = new Map<string, Thread>();
  private readonly messageStore: Message[] = [];
  private readonly runStore = new Map<string, RunState>();
  private readonly counters = new Map<string, number>();
  private readonly scripts = new Map<string, RunScriptStep[]>();
  private clock = 1700000000;

  constructor(private readonly options: InMemoryOptions = {}) {
    this.threads = {
      create: async () => {
        const thread = createThread({ id: this.nextId('thread'), created_at: this.tick() });
        this.threadStore.set(thread.id, thread);
        this.calls.push(`threads.create:${thread.id}`);
        return { ...thread };
      },
      retrieve: async (threadId) => {
        this.calls.push(`threads.retrieve:${threadId}`);
        return { ...this.requireThread(threadId) };
      },
      delete: async (threadId): Promise<ThreadDeleteResponse> => {
        this.calls.push(`threads.delete:${threadId}`);
        const deleted = this.threadStore.delete(threadId);
        return { id: threadId, object: 'thread.deleted', deleted };
      },
    };

    this.messages = {
      create: async (threadId, request) => {
        this.requireThread(threadId);
        const message = createMessage(request.content, {
          id: this.nextId('msg'),
          thread_id: threadId,
          role: request.role,
          created_at: this.tick(),
        });
        this.messageStore.push(message);
        this.calls.push(`messages.create:${threadId}`);
        return { ...message };
      },
      retrieve: async (threadId, messageId) => {
        this.calls.push(`messages.retrieve:${messageId}`);
        const message = this.messageStore.find((m) => m.thread_id === threadId && m.id === messageId);
        if (!message) throw new NotFoundError(`No message found with id '${messageId}'.`);
        return { ...message };
      },
      list: async (threadId, params) => {
        this.requireThread(threadId);
        this.calls.push(`messages.list:${threadId}`);
        return this.listMessages(threadId, params);
      },
    };

    this.runs = {
      create: async (threadId, request) => {
        this.requireThread(threadId);
        const input = this.latestUserText(threadId);
        const run = createRun({
          id: this.nextId('run'),
          thread_id: threadId,
          assistant_id: request.assistant_id,
          created_at: this.tick(),
          status: 'queued',
        });
        this.runStore.set(run.id, {
          run,
          input,
          script: [...(this.scripts.get(threadId) ?? this.options.script ?? DEFAULT_SCRIPT)],
          replied: false,
        });
        this.calls.push(`runs.create:${threadId}`);
        return { ...run };
      },
      retrieve: async (threadId, runId) => {
        this.calls.push(`runs.retrieve:${runId}`);
        const state = this.requireRun(threadId, runId);
        this.advance(state);
        return { ...state.run };
      },
      cancel: async (threadId, runId) => {
        this.calls.push(`runs.cancel:${runId}`);
        const state = this.requireRun(threadId, runId);
        state.run = { ...state.run, status: 'cancelling' };
        state.script = ['cancelled'];
        return { ...state.run };
      },
      submitToolOutputs: async (threadId, runId, request) => {
        this.calls.push(`runs.submitToolOutputs:${runId}`);
        const state = this.requireRun(threadId, runId);
        this.submittedOutputs.set(runId, request.tool_outputs);
        state.run = { ...state.run, status: 'queued', required_action: null };
        return { ...state.run };
      },
      list: async (threadId) => {
        this.calls.push(`runs.list:${threadId}`);
        const data = [...this.runStore.values()]
          .filter((state) => state.run.thread_id === threadId)
          .map((state) => ({ ...state.run }))
          .reverse();
        return { object: 'list', data, first_id: data[0]?.id ?? null, last_id: data[data.length - 1]?.id ?? null, has_more: false };
      },
      listSteps: async (_threadId, runId): Promise<RunStepListResponse> => {
        this.calls.push(`runs.listSteps:${runId}`);
        return { object: 'list', data: [], first_id: null, last_id: null, has_more: false };
      },
    };
  }

  /** Overrides the run script for runs created on one thread. */
  scriptThread(threadId: string, script: readonly RunScriptStep[]): this {
    this.scripts.set(threadId, [...script]);
    return this;
  }

  /** All stored messages of a thread, oldest first. */
  threadMessages(threadId: string): Message[] {
    return this.messageStore.filter((m) => m.thread_id === threadId);
  }

  async create(request: AssistantCreateRequest): Promise<Assistant> {
    const assistant = createAssistant({
      id: this.nextId('asst'),
      created_at: this.tick(),
      name: request.name ?? null,
      description: request.description ?? null,
      model: request.model,
      instructions: request.instructions ?? null,
      tools: request.tools ?? [],
      tool_resources: request.tool_resources ?? null,
      metadata: request.metadata ?? {},
    });
    this.assistantStore.set(assistant.id, assistant);
    this.calls.push(`assistants.create:${assistant.id}`);
    return { ...assistant };
  }

  async retrieve(assistantId: string): Promise<Assistant> {
    this.calls.push(`assistants.retrieve:${assistantId}`);
    return { ...this.requireAssistant(assistantId) };
  }

  async update(assistantId: string, request: AssistantUpdateRequest): Promise<Assistant> {
    this.calls.push(`assistants.update:${assistantId}`);
    const current = this.requireAssistant(assistantId);
    const updated: Assistant = { ...current };
    if (request.model !== undefined) updated.model = request.model;
    if (request.name !== undefined) updated.name = request.name;
    if (request.instructions !== undefined) updated.instructions = request.instructions;
    if (request.tools !== undefined) updated.tools = request.tools;
    if (request.tool_resources !== undefined) updated.tool_resources = request.tool_resources;
    if (request.metadata !== undefined) updated.metadata = request.metadata;
    this.assistantStore.set(assistantId, updated);
    return { ...updated };
  }

  async delete(assistantId: string): Promise<AssistantDeleteResponse> {
    this.calls.push(`assistants.delete:${assistantId}`);
    const deleted = this.assistantStore.delete(assistantId);
    return { id: assistantId, object: 'assistant.deleted', deleted };
  }

  async list(): Promise<AssistantListResponse> {
    this.calls.push('assistants.list');
    const data = [...this.assistantStore.values()].reverse();
    return { object: 'list', data, first_id: data[0]?.id ?? null, last_id: data[data.length - 1]?.id ?? null, has_more: false };
  }

  private listMessages(threadId: string, params: MessageListParams = {}): MessageListResponse {
    const ordered = this.threadMessages(threadId);
    if (params.order !== 'asc') ordered.reverse();
    if (params.run_id !== undefined) {
      const runId = params.run_id;
      ordered.splice(0, ordered.length, ...ordered.filter((m) => m.run_id === runId));
    }

    let start = 0;
    if (params.after !== undefined) {
      const after = params.after;
      start = ordered.findIndex((m) => m.id === after) + 1;
    }
    const limit = params.limit ?? 20;
    const data = ordered.slice(start, start + limit).map((m) => ({ ...m }));

    return {
      object: 'list',
      data,
      first_id: data[0]?.id ?? null,
      last_id: data[data.length - 1]?.id ?? null,
      has_more: start + limit < ordered.length,
    };
  }

  private advance(state: RunState): void {
    if (!['queued', 'in_progress', 'cancelling'].includes(state.run.status)) return;

    const step = state.script.length > 1 ? state.script.shift() : state.script[0];
    if (step === undefined) return;

    if (typeof step === 'string') {
      state.run = { ...state.run, status: step };
    } else {
      state.run = {
        ...state.run,
        status: step.status,
        required_action: step.required_action ?? null,
        last_error: step.last_error ?? null,
      };
    }

    if (state.run.status === 'in_progress' && state.run.started_at === null) {
      state.run.started_at = this.tick();
    }
    if (state.run.status === 'completed' && !state.replied) {
      state.replied = true;
      state.run.completed_at = this.tick();
      this.messageStore.push(
        createMessage(this.replyTo(state), {
          id: this.nextId('msg'),
          thread_id: state.run.thread_id,
          role: 'assistant',
          assistant_id: state.run.assistant_id,
          run_id: state.run.id,
          created_at: this.tick(),
        })
      );
    }
  }

  private replyTo(state: RunState): string {
    return this.options.reply ? this.options.reply(state.input, state.run) : `You said: ${state.input}`;
  }

  private latestUserText(threadId: string): string {
    const users = this.threadMessages(threadId).filter((m) => m.role === 'user');
    const last = users[users.length - 1];
    const part = last?.content[0];
    return part?.type === 'text' ? part.text.value : '';
  }

  private nextId(kind: string): string {
    const next = (this.counters.get(kind) ?? 0) + 1;
    this.counters.set(kind, next);
    return `${kind}_${next}`;
  }

  private tick(): number {
    this.clock += 1;
    return this.clock;
  }

  private requireAssistant(assistantId: string): Assistant {
    const assistant = this.assistantStore.get(assistantId);
    if (!assistant) throw new NotFoundError(`No assistant found with id '${assistantId}'.`);
    return assistant;
  }

  private requireThread(threadId: string): Thread {
    const thread = this.threadStore.get(threadId);
    if (!thread) throw new NotFoundError(`No thread found with id '${threadId}'.`);
    return thread;
  }

  private requireRun(threadId: string, runId: string): RunState {
    const state = this.runStore.get(runId);
    if (!state || state.run.thread_id !== threadId) {
      throw new NotFoundError(`No run found with id '${runId}'.`);
    }
    return state;
  }
}
