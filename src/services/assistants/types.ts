import type { PaginatedResponse, PaginationParams } from '../../types/common.js';

export interface Assistant {
  id: string;
  object: 'assistant';
  created_at: number;
  name: string | null;
  description: string | null;
  model: string;
  instructions: string | null;
  tools: AssistantTool[];
  tool_resources?: AssistantToolResources | null;
  metadata: Record<string, string>;
  temperature?: number | null;
  top_p?: number | null;
  response_format?: AssistantResponseFormat;
}

export type AssistantResponseFormat = 'auto' | { type: 'text' } | { type: 'json_object' };

export type AssistantTool =
  | CodeInterpreterTool
  | FileSearchTool
  | FunctionTool;

export interface CodeInterpreterTool {
  type: 'code_interpreter';
}

export interface FileSearchTool {
  type: 'file_search';
  file_search?: { max_num_results?: number };
}

export interface FunctionTool {
  type: 'function';
  function: AssistantFunction;
}

/** A callable function described to the model with a JSON Schema parameter list. */
export interface AssistantFunction {
  name: string;
  description?: string;
  parameters?: Record<string, unknown>;
}

/** Documents attached to the assistant, per tool. */
export interface AssistantToolResources {
  code_interpreter?: { file_ids: string[] };
  file_search?: { vector_store_ids: string[] };
}

export interface AssistantCreateRequest {
  model: string;
  name?: string;
  description?: string;
  instructions?: string;
  tools?: AssistantTool[];
  tool_resources?: AssistantToolResources;
  metadata?: Record<string, string>;
  temperature?: number;
  top_p?: number;
  response_format?: AssistantResponseFormat;
}

/**
 * Fields present replace the stored values wholesale: sending `tools`
 * replaces the whole tool list, it does not append to it.
 */
export interface AssistantUpdateRequest {
  model?: string;
  name?: string;
  description?: string;
  instructions?: string;
  tools?: AssistantTool[];
  tool_resources?: AssistantToolResources;
  metadata?: Record<string, string>;
  temperature?: number;
  top_p?: number;
  response_format?: AssistantResponseFormat;
}

export type AssistantListParams = PaginationParams;

export type AssistantListResponse = PaginatedResponse<Assistant>;

export interface AssistantDeleteResponse {
  id: string;
  object: 'assistant.deleted';
  deleted: boolean;
}
