/** A document to upload. Raw bytes are wrapped in a Blob typed from `contentType` or the filename. */
export interface UploadDocument {
  content: Blob | Uint8Array;
  filename: string;
  contentType?: string;
}

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const CONTENT_TYPES: Record<string, string> = {
  txt: 'text/plain',
  md: 'text/markdown',
  csv: 'text/csv',
  html: 'text/html',
  json: 'application/json',
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  pptx: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  ts: 'application/typescript',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
};

export function contentTypeFor(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot < 0) return DEFAULT_CONTENT_TYPE;
  return CONTENT_TYPES[filename.slice(dot + 1).toLowerCase()] ?? DEFAULT_CONTENT_TYPE;
}

/**
 * Multipart body for an upload: the document under `file`, then the plain
 * fields in insertion order. The transport leaves the content type to
 * fetch so the boundary is set for us.
 */
export function createUploadForm(document: UploadDocument, fields: Record<string, string> = {}): FormData {
  const form = new FormData();
  const blob =
    document.content instanceof Blob
      ? document.content
      : new Blob([document.content], { type: document.contentType ?? contentTypeFor(document.filename) });

  form.append('file', blob, document.filename);
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  return form;
}
