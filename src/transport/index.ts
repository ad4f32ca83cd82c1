export type { HttpTransport, HttpRequest } from './http-transport.js';
export { FetchHttpTransport } from './http-transport.js';
export { RequestBuilder } from './request-builder.js';
export type { UploadDocument } from './multipart.js';
export { createUploadForm, contentTypeFor } from './multipart.js';
