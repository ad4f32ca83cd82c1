import { describe, it, expect } from 'vitest';
import {
  ask,
  createThreadAndRun,
  followUp,
  getResponse,
  sendMessage,
  submitMessage,
} from '../composition.js';
import { messageText } from '../format.js';
import { createTestContext } from '../../__mocks__/index.js';
import type { Message } from '../../services/assistants/messages.js';

const ASSISTANT_ID = 'asst_1';

function ids(messages: readonly Message[]): string[] {
  return messages.map((m) => m.id);
}

function solve(input: string): string {
  return input.includes('3x + 11 = 14') ? 'x = 1' : 'You are welcome!';
}

describe('conversation composition', () => {
  describe('submitMessage', () => {
    it('should append the message before creating the run', async () => {
      const { service, context } = createTestContext();
      const thread = await service.threads.create();

      const run = await submitMessage(context, ASSISTANT_ID, thread, 'Hello');

      expect(service.calls).toEqual(['threads.create:thread_1', 'messages.create:thread_1', 'runs.create:thread_1']);
      expect(run).toMatchObject({ id: 'run_1', thread_id: 'thread_1', assistant_id: ASSISTANT_ID, status: 'queued' });
    });

    it('should store the text as a user message', async () => {
      const { service, context } = createTestContext();
      const thread = await service.threads.create();

      const { message } = await sendMessage(context, ASSISTANT_ID, thread, 'Hello');

      expect(message.role).toBe('user');
      expect(messageText(message)).toBe('Hello');
      expect(service.threadMessages('thread_1')).toHaveLength(1);
    });

    it('should not create a run when the append fails', async () => {
      const { service, context } = createTestContext();

      await expect(submitMessage(context, ASSISTANT_ID, { id: 'thread_missing' }, 'Hello')).rejects.toThrow(
        "No thread found with id 'thread_missing'."
      );
      expect(service.calls).toEqual([]);
    });
  });

  describe('createThreadAndRun', () => {
    it('should give every call a fresh thread', async () => {
      const { service, context } = createTestContext();

      const first = await createThreadAndRun(context, ASSISTANT_ID, 'one');
      const second = await createThreadAndRun(context, ASSISTANT_ID, 'two');

      expect([first.thread.id, second.thread.id]).toEqual(['thread_1', 'thread_2']);
      expect([first.run.thread_id, second.run.thread_id]).toEqual(['thread_1', 'thread_2']);
      expect(service.calls).toEqual([
        'threads.create:thread_1',
        'messages.create:thread_1',
        'runs.create:thread_1',
        'threads.create:thread_2',
        'messages.create:thread_2',
        'runs.create:thread_2',
      ]);
    });
  });

  describe('getResponse', () => {
    it('should list oldest first by default', async () => {
      const { service, context } = createTestContext();
      const thread = await service.threads.create();
      for (const text of ['a', 'b', 'c']) {
        await service.messages.create(thread.id, { role: 'user', content: text });
      }

      const messages = await getResponse(context, thread);

      expect(messages.map(messageText)).toEqual(['a', 'b', 'c']);
    });

    it('should return the same set in both orders, mirrored', async () => {
      const { service, context } = createTestContext();
      const thread = await service.threads.create();
      for (const text of ['a', 'b', 'c', 'd']) {
        await service.messages.create(thread.id, { role: 'user', content: text });
      }

      const asc = await getResponse(context, thread, { order: 'asc' });
      const desc = await getResponse(context, thread, { order: 'desc' });

      expect(ids(desc)).toEqual([...ids(asc)].reverse());
      const ascTimes = asc.map((m) => m.created_at);
      expect(ascTimes).toEqual([...ascTimes].sort((x, y) => x - y));
      const descTimes = desc.map((m) => m.created_at);
      expect(descTimes).toEqual([...descTimes].sort((x, y) => y - x));
    });

    it('should follow pages until the service has no more', async () => {
      const { service, context } = createTestContext();
      const thread = await service.threads.create();
      for (const text of ['a', 'b', 'c', 'd', 'e']) {
        await service.messages.create(thread.id, { role: 'user', content: text });
      }

      const messages = await getResponse(context, thread, { pageSize: 2 });

      expect(messages.map(messageText)).toEqual(['a', 'b', 'c', 'd', 'e']);
      expect(service.calls.filter((c) => c.startsWith('messages.list'))).toHaveLength(3);
    });

    it('should start after the given message', async () => {
      const { service, context } = createTestContext();
      const thread = await service.threads.create();
      for (const text of ['a', 'b', 'c']) {
        await service.messages.create(thread.id, { role: 'user', content: text });
      }

      const messages = await getResponse(context, thread, { after: 'msg_1' });

      expect(ids(messages)).toEqual(['msg_2', 'msg_3']);
    });

    it('should return an empty list for an empty thread', async () => {
      const { service, context } = createTestContext();
      const thread = await service.threads.create();

      await expect(getResponse(context, thread)).resolves.toEqual([]);
    });
  });

  describe('ask', () => {
    it('should answer a math question with one user and one assistant message', async () => {
      const { context } = createTestContext({ reply: solve });

      const { thread, run, messages } = await ask(context, ASSISTANT_ID, 'I need to solve the equation 3x + 11 = 14');
      const [question, answer] = messages;

      expect(run.status).toBe('completed');
      expect(messages.map((m) => m.role)).toEqual(['user', 'assistant']);
      expect(question && messageText(question)).toBe('I need to solve the equation 3x + 11 = 14');
      expect(answer && messageText(answer)).toContain('x = 1');
      expect(answer?.run_id).toBe(run.id);
      expect(messages.every((m) => m.thread_id === thread.id)).toBe(true);
    });

    it('should keep concurrent conversations on separate threads', async () => {
      const { service, context } = createTestContext();
      const questions = ['first question', 'second question', 'third question'];

      const exchanges = await Promise.all(questions.map((q) => ask(context, ASSISTANT_ID, q)));

      expect(new Set(exchanges.map((e) => e.thread.id)).size).toBe(3);
      exchanges.forEach((exchange, i) => {
        expect(exchange.messages.map(messageText)).toEqual([questions[i], `You said: ${questions[i]}`]);
        expect(exchange.messages.every((m) => m.thread_id === exchange.thread.id)).toBe(true);
      });
      expect(service.calls.filter((c) => c.startsWith('runs.create'))).toHaveLength(3);
    });
  });

  describe('followUp', () => {
    it('should return only the new user message and its reply', async () => {
      const { context } = createTestContext({ reply: solve });
      const first = await ask(context, ASSISTANT_ID, 'I need to solve the equation 3x + 11 = 14');

      const turn = await followUp(context, ASSISTANT_ID, first.thread, 'Thank you!');

      expect(turn.run.status).toBe('completed');
      expect(turn.messages.map((m) => [m.role, messageText(m)])).toEqual([
        ['user', 'Thank you!'],
        ['assistant', 'You are welcome!'],
      ]);
    });

    it('should keep earlier messages in place when the thread grows', async () => {
      const { context } = createTestContext({ reply: solve });
      const first = await ask(context, ASSISTANT_ID, 'I need to solve the equation 3x + 11 = 14');

      const turn = await followUp(context, ASSISTANT_ID, first.thread, 'Thank you!');
      const all = await getResponse(context, first.thread);

      expect(ids(all)).toEqual([...ids(first.messages), ...ids(turn.messages)]);
      expect(all.map((m) => m.role)).toEqual(['user', 'assistant', 'user', 'assistant']);
    });

    it('should list the latest reply first in descending order', async () => {
      const { context } = createTestContext({ reply: solve });
      const first = await ask(context, ASSISTANT_ID, 'I need to solve the equation 3x + 11 = 14');
      await followUp(context, ASSISTANT_ID, first.thread, 'Thank you!');

      const [latest] = await getResponse(context, first.thread, { order: 'desc' });

      expect(latest?.role).toBe('assistant');
      expect(latest && messageText(latest)).toBe('You are welcome!');
    });
  });
});
