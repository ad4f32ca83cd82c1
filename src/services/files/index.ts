export type { FilesService } from './service.js';
export { FilesServiceImpl } from './service.js';
export type { FilePurpose, FileObject, FileCreateRequest, FileDeleteResponse } from './types.js';
export { FilesValidator } from './validation.js';
