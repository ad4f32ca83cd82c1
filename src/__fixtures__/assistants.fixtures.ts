import type { Assistant } from '../services/assistants/types.js';
import type { Thread } from '../services/assistants/threads.js';
import type { Message, MessageRole } from '../services/assistants/messages.js';
import type { Run, RunToolCall } from '../services/assistants/runs.js';

export function createAssistant(overrides?: Partial<Assistant>): Assistant {
  return {
    id: 'asst_abc123',
    object: 'assistant',
    created_at: 1699009709,
    name: 'Math Tutor',
    description: null,
    model: 'gpt-4o',
    instructions: 'You are a personal math tutor. Answer questions briefly, in a sentence or less.',
    tools: [],
    metadata: {},
    ...overrides,
  };
}

export function createThread(overrides?: Partial<Thread>): Thread {
  return {
    id: 'thread_abc123',
    object: 'thread',
    created_at: 1699012949,
    metadata: {},
    ...overrides,
  };
}

export function createMessage(text: string, overrides?: Partial<Message>): Message {
  return {
    id: 'msg_abc123',
    object: 'thread.message',
    created_at: 1699017614,
    thread_id: 'thread_abc123',
    role: 'user',
    content: [{ type: 'text', text: { value: text, annotations: [] } }],
    assistant_id: null,
    run_id: null,
    metadata: {},
    ...overrides,
  };
}

export function createConversation(
  lines: ReadonlyArray<readonly [MessageRole, string]>,
  threadId = 'thread_abc123'
): Message[] {
  return lines.map(([role, text], i) =>
    createMessage(text, { id: `msg_${i + 1}`, role, thread_id: threadId, created_at: 1699017614 + i })
  );
}

export function createRun(overrides?: Partial<Run>): Run {
  return {
    id: 'run_abc123',
    object: 'thread.run',
    created_at: 1699063290,
    thread_id: 'thread_abc123',
    assistant_id: 'asst_abc123',
    status: 'queued',
    required_action: null,
    last_error: null,
    expires_at: 1699063890,
    started_at: null,
    cancelled_at: null,
    failed_at: null,
    completed_at: null,
    model: 'gpt-4o',
    instructions: null,
    tools: [],
    metadata: {},
    usage: null,
    ...overrides,
  };
}

export function createToolCall(name: string, args: unknown, id = 'call_abc123'): RunToolCall {
  return {
    id,
    type: 'function',
    function: { name, arguments: typeof args === 'string' ? args : JSON.stringify(args) },
  };
}

export function createRequiresActionRun(toolCalls: RunToolCall[], overrides?: Partial<Run>): Run {
  return createRun({
    status: 'requires_action',
    required_action: { type: 'submit_tool_outputs', submit_tool_outputs: { tool_calls: toolCalls } },
    ...overrides,
  });
}
