import type { AssistantToolResources } from './types.js';
import type { MessageCreateRequest } from './messages.js';

/** A conversation stored by the service. Messages are fetched separately. */
export interface Thread {
  id: string;
  object: 'thread';
  created_at: number;
  metadata: Record<string, string>;
  tool_resources?: AssistantToolResources | null;
}

export interface ThreadCreateRequest {
  /** Seed messages, stored in the given order. */
  messages?: MessageCreateRequest[];
  metadata?: Record<string, string>;
  tool_resources?: AssistantToolResources;
}

export interface ThreadDeleteResponse {
  id: string;
  object: 'thread.deleted';
  deleted: boolean;
}
