import { setTimeout as sleep } from 'node:timers/promises';
import type { Run, RunStatus } from '../services/assistants/runs.js';
import { RunWaitAbortedError, RunWaitTimeoutError } from '../errors/run-errors.js';
import { contextLogger, type ConversationContext, type ThreadRef } from './context.js';

export const DEFAULT_POLL_INTERVAL_MS = 500;

export const DEFAULT_PENDING_STATUSES: readonly RunStatus[] = ['queued', 'in_progress'];

export interface WaitOptions {
  /** Constant delay between two fetches of the run. */
  pollIntervalMs?: number;
  /** Give up with `RunWaitTimeoutError` once this much time has passed. No limit by default. */
  maxWaitMs?: number;
  /** Epoch milliseconds `maxWaitMs` counts from. Defaults to the time of the call. */
  startedAt?: number;
  signal?: AbortSignal;
  /** Statuses that keep the waiter polling. */
  pendingStatuses?: readonly RunStatus[];
  onPoll?: (run: Run) => void;
}

export function isPending(status: RunStatus, pendingStatuses: readonly RunStatus[] = DEFAULT_PENDING_STATUSES): boolean {
  return pendingStatuses.includes(status);
}

/**
 * Re-fetches `run` until its status leaves the pending set and returns the
 * run exactly as the service last reported it. A run that is already out of
 * the pending set is returned without a fetch. `requires_action` is returned
 * like any other non-pending status; see `resolveRun` for interpretation.
 */
export async function waitOnRun(
  context: ConversationContext,
  run: Run,
  thread: ThreadRef,
  options: WaitOptions = {}
): Promise<Run> {
  const {
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    maxWaitMs,
    startedAt = Date.now(),
    signal,
    pendingStatuses = DEFAULT_PENDING_STATUSES,
    onPoll,
  } = { ...context.polling, ...options };
  const logger = contextLogger(context);

  let current = run;
  let polls = 0;

  while (isPending(current.status, pendingStatuses)) {
    if (signal?.aborted) {
      throw new RunWaitAbortedError(current);
    }

    const waitedMs = Date.now() - startedAt;
    if (maxWaitMs !== undefined && waitedMs >= maxWaitMs) {
      throw new RunWaitTimeoutError(current, waitedMs);
    }

    if (polls > 0) {
      const pauseMs = maxWaitMs === undefined ? pollIntervalMs : Math.min(pollIntervalMs, maxWaitMs - waitedMs);
      try {
        await sleep(pauseMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) throw new RunWaitAbortedError(current);
        throw error;
      }
    }

    try {
      current = await context.assistants.runs.retrieve(thread.id, current.id, { signal });
    } catch (error) {
      if (signal?.aborted) throw new RunWaitAbortedError(current);
      throw error;
    }
    polls++;

    logger.debug('Polled run', { runId: current.id, threadId: thread.id, status: current.status, poll: polls });
    onPoll?.(current);
  }

  logger.info('Run left pending state', {
    runId: current.id,
    threadId: thread.id,
    status: current.status,
    polls,
    elapsedMs: Date.now() - startedAt,
  });

  return current;
}
