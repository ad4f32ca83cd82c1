export type { AssistantsService, ThreadsService, MessagesService, RunsService } from './service.js';
export { AssistantsServiceImpl, ASSISTANTS_BETA_HEADER } from './service.js';
export { AssistantsValidator } from './validation.js';
export type {
  Assistant,
  AssistantTool,
  CodeInterpreterTool,
  FileSearchTool,
  FunctionTool,
  AssistantFunction,
  AssistantToolResources,
  AssistantResponseFormat,
  AssistantCreateRequest,
  AssistantUpdateRequest,
  AssistantListParams,
  AssistantListResponse,
  AssistantDeleteResponse,
} from './types.js';
export type { Thread, ThreadCreateRequest, ThreadDeleteResponse } from './threads.js';
export type {
  MessageRole,
  MessageStatus,
  Message,
  MessageContent,
  MessageContentText,
  MessageContentImageFile,
  MessageContentImageUrl,
  MessageContentAnnotation,
  MessageAttachment,
  MessageCreateRequest,
  MessageListParams,
  MessageListResponse,
} from './messages.js';
export type {
  RunStatus,
  Run,
  RunRequiredAction,
  RunToolCall,
  RunError,
  RunUsage,
  RunCreateRequest,
  RunSubmitToolOutputsRequest,
  RunToolOutput,
  RunListParams,
  RunListResponse,
  RunStep,
  RunStepDetails,
  RunStepToolCall,
  RunStepListResponse,
} from './runs.js';
export { RUN_STATUSES } from './runs.js';
