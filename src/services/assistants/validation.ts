import { InvalidRequestError } from '../../errors/categories.js';
import type { AssistantCreateRequest, AssistantTool } from './types.js';
import type { MessageCreateRequest } from './messages.js';
import type { RunCreateRequest, RunSubmitToolOutputsRequest } from './runs.js';

const FUNCTION_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export class AssistantsValidator {
  static validateId(value: string, param: string): void {
    if (!value || value.trim() === '') {
      throw new InvalidRequestError(`${param} is required`, { param });
    }
  }

  static validateCreate(request: AssistantCreateRequest): void {
    if (!request.model) {
      throw new InvalidRequestError('model is required', { param: 'model' });
    }
    if (request.tools) {
      this.validateTools(request.tools);
    }
    if (request.temperature !== undefined && (request.temperature < 0 || request.temperature > 2)) {
      throw new InvalidRequestError('temperature must be between 0 and 2', { param: 'temperature' });
    }
    if (request.top_p !== undefined && (request.top_p < 0 || request.top_p > 1)) {
      throw new InvalidRequestError('top_p must be between 0 and 1', { param: 'top_p' });
    }
  }

  static validateTools(tools: AssistantTool[]): void {
    if (tools.length > 128) {
      throw new InvalidRequestError('an assistant can have at most 128 tools', { param: 'tools' });
    }
    const names = new Set<string>();
    tools.forEach((tool, i) => {
      if (tool.type !== 'function') return;
      if (!FUNCTION_NAME_PATTERN.test(tool.function.name)) {
        throw new InvalidRequestError(
          `tools[${i}].function.name must match ${FUNCTION_NAME_PATTERN.source}`,
          { param: `tools[${i}].function.name` }
        );
      }
      if (names.has(tool.function.name)) {
        throw new InvalidRequestError(`duplicate function name "${tool.function.name}"`, {
          param: `tools[${i}].function.name`,
        });
      }
      names.add(tool.function.name);
    });
  }

  static validateMessageCreate(request: MessageCreateRequest): void {
    if (request.role !== 'user' && request.role !== 'assistant') {
      throw new InvalidRequestError('role must be "user" or "assistant"', { param: 'role' });
    }
    if (!request.content || request.content.trim() === '') {
      throw new InvalidRequestError('content cannot be empty', { param: 'content' });
    }
  }

  static validateRunCreate(request: RunCreateRequest): void {
    this.validateId(request.assistant_id, 'assistant_id');
  }

  static validateToolOutputs(request: RunSubmitToolOutputsRequest): void {
    if (request.tool_outputs.length === 0) {
      throw new InvalidRequestError('tool_outputs cannot be empty', { param: 'tool_outputs' });
    }
    request.tool_outputs.forEach((output, i) => {
      this.validateId(output.tool_call_id, `tool_outputs[${i}].tool_call_id`);
    });
  }

  static validateLimit(limit: number | undefined): void {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > 100)) {
      throw new InvalidRequestError('limit must be an integer between 1 and 100', { param: 'limit' });
    }
  }
}
