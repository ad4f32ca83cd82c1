import { AssistantsError } from './error.js';
import type { Run, RunStatus, RunToolCall } from '../services/assistants/runs.js';

export type TerminalRunStatus = Extract<RunStatus, 'failed' | 'cancelled' | 'expired'>;

/**
 * A run ended in `failed`, `cancelled` or `expired`. Not retried; the caller
 * decides whether to start a new run on the same thread.
 */
export class TerminalRunError extends AssistantsError {
  public readonly run: Run;
  public readonly status: TerminalRunStatus;

  constructor(run: Run, status: TerminalRunStatus) {
    const detail = run.last_error ? `: ${run.last_error.message}` : '';
    super({
      message: `Run ${run.id} on thread ${run.thread_id} ended with status "${status}"${detail}`,
      code: run.last_error?.code,
    });
    this.run = run;
    this.status = status;
  }
}

/**
 * The service asked for function calls (`requires_action`) that no
 * registered handler can answer. The run stays blocked until it expires.
 */
export class UnhandledToolRequestError extends AssistantsError {
  public readonly run: Run;
  public readonly toolCalls: RunToolCall[];

  constructor(run: Run, toolCalls: RunToolCall[]) {
    const names = toolCalls.map((call) => call.function.name).join(', ');
    super({
      message: `Run ${run.id} requires action but no handler is registered for: ${names || '(no tool calls)'}`,
    });
    this.run = run;
    this.toolCalls = toolCalls;
  }
}

export class RunWaitTimeoutError extends AssistantsError {
  public readonly run: Run;
  public readonly waitedMs: number;

  constructor(run: Run, waitedMs: number) {
    super({ message: `Run ${run.id} still "${run.status}" after ${waitedMs}ms` });
    this.run = run;
    this.waitedMs = waitedMs;
  }
}

export class RunWaitAbortedError extends AssistantsError {
  public readonly run: Run;

  constructor(run: Run) {
    super({ message: `Waiting on run ${run.id} was aborted` });
    this.run = run;
  }
}

export class ToolExecutionError extends AssistantsError {
  public readonly toolName: string;
  public readonly toolCallId: string;

  constructor(toolName: string, toolCallId: string, message: string, cause?: Error) {
    super({ message: `Tool "${toolName}" (call ${toolCallId}) failed: ${message}`, cause });
    this.toolName = toolName;
    this.toolCallId = toolCallId;
  }
}
