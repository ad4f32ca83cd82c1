import type { Run } from '../services/assistants/runs.js';
import { TerminalRunError, UnhandledToolRequestError } from '../errors/run-errors.js';
import { contextLogger, type ConversationContext, type ThreadRef } from './context.js';
import { DEFAULT_PENDING_STATUSES, waitOnRun, type WaitOptions } from './waiter.js';
import type { ToolRegistry } from './tools.js';

export interface ResolveOptions extends WaitOptions {
  /** Handlers for `requires_action`. Without them a tool request fails the call. */
  tools?: ToolRegistry;
}

/**
 * Waits for `run` and interprets the outcome: returns a completed run, throws
 * `TerminalRunError` for failed, cancelled and expired runs, and answers
 * `requires_action` through `options.tools` before waiting again. A tool
 * request nobody can answer throws `UnhandledToolRequestError` instead of
 * polling a run that will never move. `maxWaitMs` bounds the whole call,
 * not each wait between tool submissions.
 */
export async function resolveRun(
  context: ConversationContext,
  run: Run,
  thread: ThreadRef,
  options: ResolveOptions = {}
): Promise<Run> {
  const { tools, ...rest } = options;
  // one budget for every wait, tool round trips included
  const waitOptions = { ...rest, startedAt: rest.startedAt ?? Date.now() };
  const basePending = waitOptions.pendingStatuses ?? context.polling?.pendingStatuses ?? DEFAULT_PENDING_STATUSES;
  const pendingStatuses = basePending.includes('cancelling') ? basePending : [...basePending, 'cancelling' as const];
  const logger = contextLogger(context);

  let current = run;
  for (;;) {
    current = await waitOnRun(context, current, thread, { ...waitOptions, pendingStatuses });

    switch (current.status) {
      case 'completed':
        return current;
      case 'failed':
      case 'cancelled':
      case 'expired':
        logger.warn('Run ended without completing', {
          runId: current.id,
          status: current.status,
          error: current.last_error?.message,
        });
        throw new TerminalRunError(current, current.status);
      case 'requires_action':
        current = await submitRequiredOutputs(context, current, thread, tools, waitOptions.signal);
        break;
      default:
        return current;
    }
  }
}

async function submitRequiredOutputs(
  context: ConversationContext,
  run: Run,
  thread: ThreadRef,
  tools: ToolRegistry | undefined,
  signal: AbortSignal | undefined
): Promise<Run> {
  const calls = run.required_action?.submit_tool_outputs.tool_calls ?? [];
  if (!tools || calls.length === 0) {
    throw new UnhandledToolRequestError(run, calls);
  }
  const unhandled = tools.unhandled(calls);
  if (unhandled.length > 0) {
    throw new UnhandledToolRequestError(run, unhandled);
  }

  const logger = contextLogger(context);
  logger.info('Answering tool calls', {
    runId: run.id,
    tools: calls.map((call) => call.function.name),
  });

  const outputs = await tools.execute(calls, run);
  return context.assistants.runs.submitToolOutputs(thread.id, run.id, { tool_outputs: outputs }, { signal });
}
