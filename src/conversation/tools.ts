import type { ZodType, ZodTypeDef, ZodError } from 'zod';
import type { FunctionTool } from '../services/assistants/types.js';
import type { Run, RunToolCall, RunToolOutput } from '../services/assistants/runs.js';
import { ConfigurationError } from '../errors/categories.js';
import { ToolExecutionError } from '../errors/run-errors.js';

export type ToolHandler<TArgs> = (args: TArgs, call: RunToolCall, run: Run) => unknown;

/**
 * A function the assistant may call. The model's JSON arguments are checked
 * against `schema` before the handler sees them (`z.unknown()` passes them
 * through untouched).
 */
export interface ToolDefinition<TArgs> {
  name: string;
  description?: string;
  /** JSON Schema sent to the service as the function's parameter list. */
  parameters?: Record<string, unknown>;
  schema: ZodType<TArgs, ZodTypeDef, unknown>;
  handler: ToolHandler<TArgs>;
}

interface RegisteredTool {
  definition: FunctionTool;
  invoke(args: unknown, call: RunToolCall, run: Run): Promise<unknown>;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<TArgs>(tool: ToolDefinition<TArgs>): this {
    if (this.tools.has(tool.name)) {
      throw new ConfigurationError(`Tool "${tool.name}" is already registered`);
    }

    const definition: FunctionTool = { type: 'function', function: { name: tool.name } };
    if (tool.description !== undefined) definition.function.description = tool.description;
    if (tool.parameters !== undefined) definition.function.parameters = tool.parameters;

    const invoke = async (args: unknown, call: RunToolCall, run: Run): Promise<unknown> => {
      const parsed = tool.schema.safeParse(args);
      if (!parsed.success) {
        throw new ToolExecutionError(tool.name, call.id, `invalid arguments (${formatIssues(parsed.error)})`);
      }
      return tool.handler(parsed.data, call, run);
    };

    this.tools.set(tool.name, { definition, invoke });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** Tool entries to put on an assistant so the model knows these functions exist. */
  definitions(): FunctionTool[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  /** Tool calls this registry has no handler for. */
  unhandled(calls: readonly RunToolCall[]): RunToolCall[] {
    return calls.filter((call) => !this.tools.has(call.function.name));
  }

  async execute(calls: readonly RunToolCall[], run: Run): Promise<RunToolOutput[]> {
    return Promise.all(calls.map((call) => this.executeOne(call, run)));
  }

  private async executeOne(call: RunToolCall, run: Run): Promise<RunToolOutput> {
    const tool = this.tools.get(call.function.name);
    if (!tool) {
      throw new ToolExecutionError(call.function.name, call.id, 'no handler registered');
    }

    const args = parseArguments(call);
    try {
      const result = await tool.invoke(args, call, run);
      return { tool_call_id: call.id, output: serializeOutput(result) };
    } catch (error) {
      if (error instanceof ToolExecutionError) throw error;
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ToolExecutionError(call.function.name, call.id, cause.message, cause);
    }
  }
}

function parseArguments(call: RunToolCall): unknown {
  const raw = call.function.arguments.trim();
  if (raw === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ToolExecutionError(
      call.function.name,
      call.id,
      'arguments are not valid JSON',
      error instanceof Error ? error : undefined
    );
  }
}

export function serializeOutput(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value ?? null);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
