import type { ResilienceOrchestrator } from '../../resilience/orchestrator.js';
import { RequestBuilder } from '../../transport/request-builder.js';
import { createUploadForm } from '../../transport/multipart.js';
import type { FileObject, FileDeleteResponse, FileCreateRequest } from './types.js';
import { FilesValidator } from './validation.js';
import type { RequestOptions } from '../../types/common.js';

/** Document upload for assistants; the service owns storage and processing. */
export interface FilesService {
  create(request: FileCreateRequest, options?: RequestOptions): Promise<FileObject>;
  retrieve(fileId: string, options?: RequestOptions): Promise<FileObject>;
  delete(fileId: string, options?: RequestOptions): Promise<FileDeleteResponse>;
}

export class FilesServiceImpl implements FilesService {
  constructor(private readonly orchestrator: ResilienceOrchestrator) {}

  async create(request: FileCreateRequest, options?: RequestOptions): Promise<FileObject> {
    FilesValidator.validateCreate(request);

    const formData = createUploadForm(
      { content: request.file, filename: request.filename, contentType: request.contentType },
      { purpose: request.purpose }
    );

    const httpRequest = RequestBuilder.create()
      .setMethod('POST')
      .setPath('/files')
      .setBody(formData)
      .setOptions(options)
      .build();

    return this.orchestrator.request<FileObject>(httpRequest);
  }

  async retrieve(fileId: string, options?: RequestOptions): Promise<FileObject> {
    FilesValidator.validateFileId(fileId);

    const httpRequest = RequestBuilder.create()
      .setMethod('GET')
      .setPath(`/files/${encodeURIComponent(fileId)}`)
      .setOptions(options)
      .build();

    return this.orchestrator.request<FileObject>(httpRequest);
  }

  async delete(fileId: string, options?: RequestOptions): Promise<FileDeleteResponse> {
    FilesValidator.validateFileId(fileId);

    const httpRequest = RequestBuilder.create()
      .setMethod('DELETE')
      .setPath(`/files/${encodeURIComponent(fileId)}`)
      .setOptions(options)
      .build();

    return this.orchestrator.request<FileDeleteResponse>(httpRequest);
  }
}
