import type { PaginatedResponse, PaginationParams } from '../../types/common.js';

export type MessageRole = 'user' | 'assistant';
export type MessageStatus = 'in_progress' | 'incomplete' | 'completed';

export interface Message {
  id: string;
  object: 'thread.message';
  created_at: number;
  thread_id: string;
  status?: MessageStatus;
  role: MessageRole;
  content: MessageContent[];
  assistant_id: string | null;
  run_id: string | null;
  attachments?: MessageAttachment[] | null;
  metadata: Record<string, string>;
}

export type MessageContent = MessageContentText | MessageContentImageFile | MessageContentImageUrl;

export interface MessageContentText {
  type: 'text';
  text: {
    value: string;
    annotations: MessageContentAnnotation[];
  };
}

export interface MessageContentImageFile {
  type: 'image_file';
  image_file: {
    file_id: string;
    detail?: 'auto' | 'low' | 'high';
  };
}

export interface MessageContentImageUrl {
  type: 'image_url';
  image_url: {
    url: string;
    detail?: 'auto' | 'low' | 'high';
  };
}

export type MessageContentAnnotation =
  | MessageContentAnnotationFileCitation
  | MessageContentAnnotationFilePath;

export interface MessageContentAnnotationFileCitation {
  type: 'file_citation';
  text: string;
  file_citation: {
    file_id: string;
    quote?: string;
  };
  start_index: number;
  end_index: number;
}

export interface MessageContentAnnotationFilePath {
  type: 'file_path';
  text: string;
  file_path: {
    file_id: string;
  };
  start_index: number;
  end_index: number;
}

/** A file made available to the tools named with it. */
export interface MessageAttachment {
  file_id: string;
  tools: { type: 'code_interpreter' | 'file_search' }[];
}

export interface MessageCreateRequest {
  role: MessageRole;
  content: string;
  attachments?: MessageAttachment[];
  metadata?: Record<string, string>;
}

/** `order` defaults to `desc` (most recent first) on the service side. */
export interface MessageListParams extends PaginationParams {
  /** Only messages produced by this run. */
  run_id?: string;
}

export type MessageListResponse = PaginatedResponse<Message>;
