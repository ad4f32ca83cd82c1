import { setupServer } from 'msw/node';
import { http, HttpResponse, type PathParams } from 'msw';
import { beforeAll, afterEach, afterAll } from 'vitest';
import { createApiError, createAssistant, createMessage, createRun, createThread } from '../../__fixtures__/index.js';
import type { RunScriptStep } from '../../__mocks__/index.js';
import type { Assistant, AssistantCreateRequest } from '../../services/assistants/types.js';
import type { Message, MessageCreateRequest } from '../../services/assistants/messages.js';
import type { Run, RunCreateRequest, RunSubmitToolOutputsRequest, RunToolOutput } from '../../services/assistants/runs.js';

export const BASE_URL = 'https://api.openai.com/v1';

export interface SeenRequest {
  method: string;
  path: string;
  authorization: string | null;
  beta: string | null;
}

interface RunRecord {
  run: Run;
  input: string;
  script: RunScriptStep[];
}

/** What the fake API holds between requests. Cleared after every test. */
class ApiState {
  readonly assistants = new Map<string, Assistant>();
  readonly threads = new Set<string>();
  readonly messages: Message[] = [];
  readonly runs = new Map<string, RunRecord>();
  readonly toolOutputs = new Map<string, RunToolOutput[]>();
  readonly seen: SeenRequest[] = [];
  script: RunScriptStep[] = ['in_progress', 'completed'];
  reply: (input: string) => string = (input) => `You said: ${input}`;

  private counter = 0;
  private clock = 1700000000;

  nextId(prefix: string): string {
    this.counter += 1;
    return `${prefix}_${this.counter}`;
  }

  tick(): number {
    this.clock += 1;
    return this.clock;
  }

  reset(): void {
    this.assistants.clear();
    this.threads.clear();
    this.messages.length = 0;
    this.runs.clear();
    this.toolOutputs.clear();
    this.seen.length = 0;
    this.script = ['in_progress', 'completed'];
    this.reply = (input) => `You said: ${input}`;
    this.counter = 0;
    this.clock = 1700000000;
  }
}

export const api = new ApiState();

function record(request: Request): void {
  api.seen.push({
    method: request.method,
    path: new URL(request.url).pathname,
    authorization: request.headers.get('authorization'),
    beta: request.headers.get('openai-beta'),
  });
}

function notFound(kind: string, id: string) {
  return HttpResponse.json(createApiError(`No ${kind} found with id '${id}'.`), { status: 404 });
}

function lastUserText(threadId: string): string {
  const users = api.messages.filter((m) => m.thread_id === threadId && m.role === 'user');
  const part = users[users.length - 1]?.content[0];
  return part?.type === 'text' ? part.text.value : '';
}

function advance(stored: RunRecord): void {
  if (!['queued', 'in_progress', 'cancelling'].includes(stored.run.status)) return;

  const step = stored.script.length > 1 ? stored.script.shift() : stored.script[0];
  if (step === undefined) return;
  stored.run =
    typeof step === 'string'
      ? { ...stored.run, status: step }
      : { ...stored.run, status: step.status, required_action: step.required_action ?? null, last_error: step.last_error ?? null };

  if (stored.run.status === 'completed') {
    stored.run.completed_at = api.tick();
    api.messages.push(
      createMessage(api.reply(stored.input), {
        id: api.nextId('msg'),
        thread_id: stored.run.thread_id,
        role: 'assistant',
        assistant_id: stored.run.assistant_id,
        run_id: stored.run.id,
        created_at: api.tick(),
      })
    );
  }
}

export const handlers = [
  http.post<PathParams, AssistantCreateRequest>(`${BASE_URL}/assistants`, async ({ request }) => {
    record(request);
    const body = await request.json();
    const assistant = createAssistant({
      id: api.nextId('asst'),
      created_at: api.tick(),
      name: body.name ?? null,
      model: body.model,
      instructions: body.instructions ?? null,
      tools: body.tools ?? [],
    });
    api.assistants.set(assistant.id, assistant);
    return HttpResponse.json(assistant);
  }),

  http.delete<{ assistantId: string }>(`${BASE_URL}/assistants/:assistantId`, ({ request, params }) => {
    record(request);
    const deleted = api.assistants.delete(params.assistantId);
    return HttpResponse.json({ id: params.assistantId, object: 'assistant.deleted', deleted });
  }),

  http.post(`${BASE_URL}/threads`, ({ request }) => {
    record(request);
    const thread = createThread({ id: api.nextId('thread'), created_at: api.tick() });
    api.threads.add(thread.id);
    return HttpResponse.json(thread);
  }),

  http.post<{ threadId: string }, MessageCreateRequest>(
    `${BASE_URL}/threads/:threadId/messages`,
    async ({ request, params }) => {
      record(request);
      if (!api.threads.has(params.threadId)) return notFound('thread', params.threadId);
      const body = await request.json();
      const message = createMessage(body.content, {
        id: api.nextId('msg'),
        thread_id: params.threadId,
        role: body.role,
        created_at: api.tick(),
      });
      api.messages.push(message);
      return HttpResponse.json(message);
    }
  ),

  http.get<{ threadId: string }>(`${BASE_URL}/threads/:threadId/messages`, ({ request, params }) => {
    record(request);
    const query = new URL(request.url).searchParams;
    const ordered = api.messages.filter((m) => m.thread_id === params.threadId);
    if (query.get('order') !== 'asc') ordered.reverse();

    const after = query.get('after');
    const start = after === null ? 0 : ordered.findIndex((m) => m.id === after) + 1;
    const limit = Number(query.get('limit') ?? '20');
    const data = ordered.slice(start, start + limit);

    return HttpResponse.json({
      object: 'list',
      data,
      first_id: data[0]?.id ?? null,
      last_id: data[data.length - 1]?.id ?? null,
      has_more: start + limit < ordered.length,
    });
  }),

  http.post<{ threadId: string }, RunCreateRequest>(`${BASE_URL}/threads/:threadId/runs`, async ({ request, params }) => {
    record(request);
    if (!api.threads.has(params.threadId)) return notFound('thread', params.threadId);
    const body = await request.json();
    const run = createRun({
      id: api.nextId('run'),
      thread_id: params.threadId,
      assistant_id: body.assistant_id,
      created_at: api.tick(),
    });
    api.runs.set(run.id, { run, input: lastUserText(params.threadId), script: [...api.script] });
    return HttpResponse.json(run);
  }),

  http.get<{ threadId: string; runId: string }>(`${BASE_URL}/threads/:threadId/runs/:runId`, ({ request, params }) => {
    record(request);
    const stored = api.runs.get(params.runId);
    if (!stored) return notFound('run', params.runId);
    advance(stored);
    return HttpResponse.json(stored.run);
  }),

  http.post<{ threadId: string; runId: string }, RunSubmitToolOutputsRequest>(
    `${BASE_URL}/threads/:threadId/runs/:runId/submit_tool_outputs`,
    async ({ request, params }) => {
      record(request);
      const stored = api.runs.get(params.runId);
      if (!stored) return notFound('run', params.runId);
      const body = await request.json();
      api.toolOutputs.set(params.runId, body.tool_outputs);
      stored.run = { ...stored.run, status: 'queued', required_action: null };
      return HttpResponse.json(stored.run);
    }
  ),
];

export const server = setupServer(...handlers);

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  server.resetHandlers();
  api.reset();
});

afterAll(() => {
  server.close();
});

/** Fails the next poll of any run with the given status before the stored run is touched. */
export function failNextPoll(status: number): void {
  server.use(
    http.get(
      `${BASE_URL}/threads/:threadId/runs/:runId`,
      ({ request }) => {
        record(request);
        return HttpResponse.json(createApiError('The server is overloaded.', 'server_error'), { status });
      },
      { once: true }
    )
  );
}
