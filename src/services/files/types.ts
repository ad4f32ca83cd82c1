export type FilePurpose = 'assistants' | 'vision' | 'batch' | 'fine-tune';

export interface FileObject {
  id: string;
  object: 'file';
  bytes: number;
  created_at: number;
  filename: string;
  purpose: string;
  status?: 'uploaded' | 'processed' | 'error';
  status_details?: string | null;
}

export interface FileDeleteResponse {
  id: string;
  object: 'file';
  deleted: boolean;
}

export interface FileCreateRequest {
  file: Blob | Uint8Array;
  filename: string;
  purpose: FilePurpose;
  /** Sent with raw bytes; guessed from the filename when absent. */
  contentType?: string;
}
