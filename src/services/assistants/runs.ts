import type { PaginatedResponse, PaginationParams } from '../../types/common.js';
import type { AssistantTool } from './types.js';

export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'cancelled'
  | 'failed'
  | 'completed'
  | 'expired';

export const RUN_STATUSES: readonly RunStatus[] = [
  'queued',
  'in_progress',
  'requires_action',
  'cancelling',
  'cancelled',
  'failed',
  'completed',
  'expired',
];

export interface Run {
  id: string;
  object: 'thread.run';
  created_at: number;
  thread_id: string;
  assistant_id: string;
  status: RunStatus;
  required_action: RunRequiredAction | null;
  last_error: RunError | null;
  expires_at: number | null;
  started_at: number | null;
  cancelled_at: number | null;
  failed_at: number | null;
  completed_at: number | null;
  model: string;
  instructions: string | null;
  tools: AssistantTool[];
  metadata: Record<string, string>;
  usage: RunUsage | null;
}

export interface RunRequiredAction {
  type: 'submit_tool_outputs';
  submit_tool_outputs: {
    tool_calls: RunToolCall[];
  };
}

export interface RunToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    /** JSON-encoded argument object produced by the model. */
    arguments: string;
  };
}

export interface RunError {
  code: string;
  message: string;
}

export interface RunUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface RunCreateRequest {
  assistant_id: string;
  model?: string | null;
  instructions?: string | null;
  additional_instructions?: string | null;
  tools?: AssistantTool[] | null;
  metadata?: Record<string, string>;
}

export interface RunSubmitToolOutputsRequest {
  tool_outputs: RunToolOutput[];
}

export interface RunToolOutput {
  tool_call_id: string;
  output: string;
}

export type RunListParams = PaginationParams;

export type RunListResponse = PaginatedResponse<Run>;

export interface RunStep {
  id: string;
  object: 'thread.run.step';
  created_at: number;
  assistant_id: string;
  thread_id: string;
  run_id: string;
  type: 'message_creation' | 'tool_calls';
  status: 'in_progress' | 'cancelled' | 'failed' | 'completed' | 'expired';
  step_details: RunStepDetails;
  last_error: RunError | null;
  completed_at: number | null;
  usage: RunUsage | null;
}

export type RunStepDetails = RunStepDetailsMessageCreation | RunStepDetailsToolCalls;

export interface RunStepDetailsMessageCreation {
  type: 'message_creation';
  message_creation: {
    message_id: string;
  };
}

export interface RunStepDetailsToolCalls {
  type: 'tool_calls';
  tool_calls: RunStepToolCall[];
}

export type RunStepToolCall =
  | { id: string; type: 'code_interpreter'; code_interpreter: { input: string; outputs: unknown[] } }
  | { id: string; type: 'file_search'; file_search: Record<string, unknown> }
  | { id: string; type: 'function'; function: { name: string; arguments: string; output: string | null } };

export type RunStepListResponse = PaginatedResponse<RunStep>;
