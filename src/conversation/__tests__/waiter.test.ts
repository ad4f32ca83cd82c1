import { describe, it, expect } from 'vitest';
import { waitOnRun, isPending, DEFAULT_POLL_INTERVAL_MS } from '../waiter.js';
import { RunWaitAbortedError, RunWaitTimeoutError } from '../../errors/run-errors.js';
import { createTestContext, type TestContext } from '../../__mocks__/index.js';
import { createRun, createThread, createToolCall } from '../../__fixtures__/index.js';
import type { RunStatus } from '../../services/assistants/runs.js';

async function startRun(setup: TestContext) {
  const thread = await setup.service.threads.create();
  const run = await setup.service.runs.create(thread.id, { assistant_id: 'asst_1' });
  return { thread, run };
}

function retrieves(calls: readonly string[]): string[] {
  return calls.filter((call) => call.startsWith('runs.retrieve'));
}

describe('waitOnRun', () => {
  it('should poll every 500ms by default', () => {
    expect(DEFAULT_POLL_INTERVAL_MS).toBe(500);
  });

  describe('pending statuses', () => {
    it('should treat queued and in_progress as pending', () => {
      const pending = (['queued', 'in_progress'] as const).map((status) => isPending(status));
      expect(pending).toEqual([true, true]);
    });

    it('should treat every other status as finished', () => {
      const finished: RunStatus[] = ['requires_action', 'cancelling', 'cancelled', 'failed', 'completed', 'expired'];
      expect(finished.filter((status) => isPending(status))).toEqual([]);
    });
  });

  describe('happy path', () => {
    it('should return a run that is already finished without fetching it', async () => {
      const setup = createTestContext();
      const run = createRun({ status: 'completed' });

      const result = await waitOnRun(setup.context, run, createThread());

      expect(result).toBe(run);
      expect(setup.service.calls).toEqual([]);
    });

    it('should poll until the run leaves the pending set', async () => {
      const setup = createTestContext({ script: ['queued', 'in_progress', 'in_progress', 'completed'] });
      const { thread, run } = await startRun(setup);
      const seen: RunStatus[] = [];

      const result = await waitOnRun(setup.context, run, thread, { onPoll: (r) => seen.push(r.status) });

      expect(seen).toEqual(['queued', 'in_progress', 'in_progress', 'completed']);
      expect(result.status).toBe('completed');
      expect(result.id).toBe('run_1');
      expect(retrieves(setup.service.calls)).toHaveLength(4);
    });

    it('should return the run as last reported by the service', async () => {
      const setup = createTestContext();
      const { thread, run } = await startRun(setup);

      const result = await waitOnRun(setup.context, run, thread);
      const stored = await setup.service.runs.retrieve(thread.id, run.id);

      expect(result).toEqual(stored);
      expect(result).not.toBe(run);
    });

    it('should fetch exactly once when the first poll reports failure', async () => {
      const setup = createTestContext({
        script: [{ status: 'failed', last_error: { code: 'server_error', message: 'Something went wrong.' } }],
      });
      const { thread, run } = await startRun(setup);

      const result = await waitOnRun(setup.context, run, thread);

      expect(result.status).toBe('failed');
      expect(result.last_error).toEqual({ code: 'server_error', message: 'Something went wrong.' });
      expect(retrieves(setup.service.calls)).toEqual(['runs.retrieve:run_1']);
    });

    it('should stop on requires_action and leave it to the caller', async () => {
      const call = createToolCall('lookup', { q: 'x' });
      const setup = createTestContext({
        script: [
          'in_progress',
          {
            status: 'requires_action',
            required_action: { type: 'submit_tool_outputs', submit_tool_outputs: { tool_calls: [call] } },
          },
        ],
      });
      const { thread, run } = await startRun(setup);

      const result = await waitOnRun(setup.context, run, thread);

      expect(result.status).toBe('requires_action');
      expect(result.required_action?.submit_tool_outputs.tool_calls).toEqual([call]);
      expect(retrieves(setup.service.calls)).toHaveLength(2);
    });

    it('should keep polling through statuses added to the pending set', async () => {
      const setup = createTestContext({ script: ['cancelling', 'cancelled'] });
      const { thread, run } = await startRun(setup);

      const result = await waitOnRun(setup.context, run, thread, {
        pendingStatuses: ['queued', 'in_progress', 'cancelling'],
      });

      expect(result.status).toBe('cancelled');
      expect(retrieves(setup.service.calls)).toHaveLength(2);
    });

    it('should log every poll at debug and the outcome at info', async () => {
      const setup = createTestContext();
      const { thread, run } = await startRun(setup);

      await waitOnRun(setup.context, run, thread);

      expect(setup.logger.messages('debug')).toEqual(['Polled run', 'Polled run']);
      expect(setup.logger.messages('info')).toEqual(['Run left pending state']);
      const outcome = setup.logger.entries.find((e) => e.level === 'info');
      expect(outcome?.context).toMatchObject({ runId: 'run_1', threadId: 'thread_1', status: 'completed', polls: 2 });
    });
  });

  describe('limits', () => {
    it('should throw RunWaitTimeoutError once maxWaitMs has passed', async () => {
      const setup = createTestContext({ script: ['in_progress'] });
      const { thread, run } = await startRun(setup);

      const error = await waitOnRun(setup.context, run, thread, { pollIntervalMs: 5, maxWaitMs: 20 }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(RunWaitTimeoutError);
      expect(error).toMatchObject({ run: { id: 'run_1', status: 'in_progress' } });
    });

    it('should take maxWaitMs from the context polling defaults', async () => {
      const setup = createTestContext({ script: ['queued'] });
      const { thread, run } = await startRun(setup);
      const context = { ...setup.context, polling: { pollIntervalMs: 5, maxWaitMs: 15 } };

      await expect(waitOnRun(context, run, thread)).rejects.toBeInstanceOf(RunWaitTimeoutError);
    });

    it('should not sleep past the time limit', async () => {
      const setup = createTestContext({ script: ['in_progress'] });
      const { thread, run } = await startRun(setup);

      const waiting = waitOnRun(setup.context, run, thread, { pollIntervalMs: 60_000, maxWaitMs: 30 });

      await expect(waiting).rejects.toBeInstanceOf(RunWaitTimeoutError);
    });

    it('should count maxWaitMs from startedAt', async () => {
      const setup = createTestContext({ script: ['in_progress'] });
      const { thread, run } = await startRun(setup);

      const error = await waitOnRun(setup.context, run, thread, {
        maxWaitMs: 500,
        startedAt: Date.now() - 1_000,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RunWaitTimeoutError);
      expect(error).toMatchObject({ run: { id: 'run_1', status: 'queued' } });
      expect(retrieves(setup.service.calls)).toEqual([]);
    });

    it('should throw RunWaitAbortedError without fetching when already aborted', async () => {
      const setup = createTestContext();
      const { thread, run } = await startRun(setup);
      const controller = new AbortController();
      controller.abort();

      await expect(waitOnRun(setup.context, run, thread, { signal: controller.signal })).rejects.toBeInstanceOf(
        RunWaitAbortedError
      );
      expect(retrieves(setup.service.calls)).toEqual([]);
    });

    it('should throw RunWaitAbortedError when aborted between polls', async () => {
      const setup = createTestContext({ script: ['in_progress'] });
      const { thread, run } = await startRun(setup);
      const controller = new AbortController();

      const waiting = waitOnRun(setup.context, run, thread, {
        pollIntervalMs: 10_000,
        signal: controller.signal,
        onPoll: () => controller.abort(),
      });

      await expect(waiting).rejects.toBeInstanceOf(RunWaitAbortedError);
      expect(retrieves(setup.service.calls)).toHaveLength(1);
    });
  });
});
