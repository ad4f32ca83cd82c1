import type { ResilienceOrchestrator } from '../../resilience/orchestrator.js';
import type { HttpMethod, PaginationParams, QueryParams, RequestOptions } from '../../types/common.js';
import { RequestBuilder, type PathParams } from '../../transport/request-builder.js';
import { AssistantsValidator } from './validation.js';
import type {
  Assistant,
  AssistantCreateRequest,
  AssistantUpdateRequest,
  AssistantListParams,
  AssistantListResponse,
  AssistantDeleteResponse,
} from './types.js';
import type { Thread, ThreadCreateRequest, ThreadDeleteResponse } from './threads.js';
import type { Message, MessageCreateRequest, MessageListParams, MessageListResponse } from './messages.js';
import type {
  Run,
  RunCreateRequest,
  RunSubmitToolOutputsRequest,
  RunListParams,
  RunListResponse,
  RunStepListResponse,
} from './runs.js';

export const ASSISTANTS_BETA_HEADER = { 'OpenAI-Beta': 'assistants=v2' } as const;

const ASSISTANT_PATH = '/assistants/{assistant_id}';
const THREAD_PATH = '/threads/{thread_id}';
const RUN_PATH = `${THREAD_PATH}/runs/{run_id}`;

export interface ThreadsService {
  create(request?: ThreadCreateRequest, options?: RequestOptions): Promise<Thread>;
  retrieve(threadId: string, options?: RequestOptions): Promise<Thread>;
  delete(threadId: string, options?: RequestOptions): Promise<ThreadDeleteResponse>;
}

export interface MessagesService {
  create(threadId: string, request: MessageCreateRequest, options?: RequestOptions): Promise<Message>;
  retrieve(threadId: string, messageId: string, options?: RequestOptions): Promise<Message>;
  list(threadId: string, params?: MessageListParams, options?: RequestOptions): Promise<MessageListResponse>;
}

export interface RunsService {
  create(threadId: string, request: RunCreateRequest, options?: RequestOptions): Promise<Run>;
  retrieve(threadId: string, runId: string, options?: RequestOptions): Promise<Run>;
  cancel(threadId: string, runId: string, options?: RequestOptions): Promise<Run>;
  submitToolOutputs(threadId: string, runId: string, request: RunSubmitToolOutputsRequest, options?: RequestOptions): Promise<Run>;
  list(threadId: string, params?: RunListParams, options?: RequestOptions): Promise<RunListResponse>;
  listSteps(threadId: string, runId: string, params?: RunListParams, options?: RequestOptions): Promise<RunStepListResponse>;
}

/**
 * The remote assistants service: assistants at the top level, with threads,
 * messages and runs as sub-services. Composition helpers depend only on this
 * interface, so tests can substitute an in-process fake.
 */
export interface AssistantsService {
  create(request: AssistantCreateRequest, options?: RequestOptions): Promise<Assistant>;
  retrieve(assistantId: string, options?: RequestOptions): Promise<Assistant>;
  update(assistantId: string, request: AssistantUpdateRequest, options?: RequestOptions): Promise<Assistant>;
  delete(assistantId: string, options?: RequestOptions): Promise<AssistantDeleteResponse>;
  list(params?: AssistantListParams, options?: RequestOptions): Promise<AssistantListResponse>;

  readonly threads: ThreadsService;
  readonly messages: MessagesService;
  readonly runs: RunsService;
}

export class AssistantsServiceImpl implements AssistantsService {
  public readonly threads: ThreadsService;
  public readonly messages: MessagesService;
  public readonly runs: RunsService;

  constructor(private readonly orchestrator: ResilienceOrchestrator) {
    this.threads = this.createThreadsService();
    this.messages = this.createMessagesService();
    this.runs = this.createRunsService();
  }

  async create(request: AssistantCreateRequest, options?: RequestOptions): Promise<Assistant> {
    AssistantsValidator.validateCreate(request);
    return this.send<Assistant>('POST', '/assistants', {}, options, { body: request });
  }

  async retrieve(assistantId: string, options?: RequestOptions): Promise<Assistant> {
    AssistantsValidator.validateId(assistantId, 'assistantId');
    return this.send<Assistant>('GET', ASSISTANT_PATH, { assistant_id: assistantId }, options);
  }

  async update(assistantId: string, request: AssistantUpdateRequest, options?: RequestOptions): Promise<Assistant> {
    AssistantsValidator.validateId(assistantId, 'assistantId');
    if (request.tools) {
      AssistantsValidator.validateTools(request.tools);
    }
    return this.send<Assistant>('POST', ASSISTANT_PATH, { assistant_id: assistantId }, options, { body: request });
  }

  async delete(assistantId: string, options?: RequestOptions): Promise<AssistantDeleteResponse> {
    AssistantsValidator.validateId(assistantId, 'assistantId');
    return this.send<AssistantDeleteResponse>('DELETE', ASSISTANT_PATH, { assistant_id: assistantId }, options);
  }

  async list(params?: AssistantListParams, options?: RequestOptions): Promise<AssistantListResponse> {
    AssistantsValidator.validateLimit(params?.limit);
    return this.send<AssistantListResponse>('GET', '/assistants', {}, options, { query: listQuery(params) });
  }

  private createThreadsService(): ThreadsService {
    return {
      create: async (request?: ThreadCreateRequest, options?: RequestOptions): Promise<Thread> => {
        request?.messages?.forEach((message) => AssistantsValidator.validateMessageCreate(message));
        return this.send<Thread>('POST', '/threads', {}, options, { body: request ?? {} });
      },

      retrieve: async (threadId: string, options?: RequestOptions): Promise<Thread> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        return this.send<Thread>('GET', THREAD_PATH, { thread_id: threadId }, options);
      },

      delete: async (threadId: string, options?: RequestOptions): Promise<ThreadDeleteResponse> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        return this.send<ThreadDeleteResponse>('DELETE', THREAD_PATH, { thread_id: threadId }, options);
      },
    };
  }

  private createMessagesService(): MessagesService {
    return {
      create: async (threadId: string, request: MessageCreateRequest, options?: RequestOptions): Promise<Message> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateMessageCreate(request);
        return this.send<Message>('POST', `${THREAD_PATH}/messages`, { thread_id: threadId }, options, { body: request });
      },

      retrieve: async (threadId: string, messageId: string, options?: RequestOptions): Promise<Message> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateId(messageId, 'messageId');
        return this.send<Message>(
          'GET',
          `${THREAD_PATH}/messages/{message_id}`,
          { thread_id: threadId, message_id: messageId },
          options
        );
      },

      list: async (threadId: string, params?: MessageListParams, options?: RequestOptions): Promise<MessageListResponse> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateLimit(params?.limit);
        const query = { ...listQuery(params), run_id: params?.run_id };
        return this.send<MessageListResponse>('GET', `${THREAD_PATH}/messages`, { thread_id: threadId }, options, {
          query,
        });
      },
    };
  }

  private createRunsService(): RunsService {
    return {
      create: async (threadId: string, request: RunCreateRequest, options?: RequestOptions): Promise<Run> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateRunCreate(request);
        return this.send<Run>('POST', `${THREAD_PATH}/runs`, { thread_id: threadId }, options, { body: request });
      },

      retrieve: async (threadId: string, runId: string, options?: RequestOptions): Promise<Run> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateId(runId, 'runId');
        return this.send<Run>('GET', RUN_PATH, { thread_id: threadId, run_id: runId }, options);
      },

      cancel: async (threadId: string, runId: string, options?: RequestOptions): Promise<Run> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateId(runId, 'runId');
        return this.send<Run>('POST', `${RUN_PATH}/cancel`, { thread_id: threadId, run_id: runId }, options);
      },

      submitToolOutputs: async (
        threadId: string,
        runId: string,
        request: RunSubmitToolOutputsRequest,
        options?: RequestOptions
      ): Promise<Run> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateId(runId, 'runId');
        AssistantsValidator.validateToolOutputs(request);
        return this.send<Run>(
          'POST',
          `${RUN_PATH}/submit_tool_outputs`,
          { thread_id: threadId, run_id: runId },
          options,
          { body: request }
        );
      },

      list: async (threadId: string, params?: RunListParams, options?: RequestOptions): Promise<RunListResponse> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateLimit(params?.limit);
        return this.send<RunListResponse>('GET', `${THREAD_PATH}/runs`, { thread_id: threadId }, options, {
          query: listQuery(params),
        });
      },

      listSteps: async (
        threadId: string,
        runId: string,
        params?: RunListParams,
        options?: RequestOptions
      ): Promise<RunStepListResponse> => {
        AssistantsValidator.validateId(threadId, 'threadId');
        AssistantsValidator.validateId(runId, 'runId');
        AssistantsValidator.validateLimit(params?.limit);
        return this.send<RunStepListResponse>('GET', `${RUN_PATH}/steps`, { thread_id: threadId, run_id: runId }, options, {
          query: listQuery(params),
        });
      },
    };
  }

  private send<T>(
    method: HttpMethod,
    path: string,
    params: PathParams,
    options?: RequestOptions,
    payload: { body?: unknown; query?: QueryParams } = {}
  ): Promise<T> {
    const builder = RequestBuilder.create(method, path, params)
      .setHeaders(ASSISTANTS_BETA_HEADER)
      .setOptions(options);
    if (payload.body !== undefined) builder.setBody(payload.body);
    if (payload.query) builder.setQuery(payload.query);

    return this.orchestrator.request<T>(builder.build());
  }
}

function listQuery(params: PaginationParams = {}): QueryParams {
  const { limit, order, after, before } = params;
  return { limit, order, after, before };
}
