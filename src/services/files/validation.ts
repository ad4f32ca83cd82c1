import { z } from 'zod';
import { InvalidRequestError } from '../../errors/categories.js';
import type { FileCreateRequest } from './types.js';

const fileIdSchema = z.string().trim().min(1, 'fileId is required');

const fileCreateSchema = z.object({
  file: z.union([z.instanceof(Blob), z.instanceof(Uint8Array)], {
    errorMap: () => ({ message: 'file must be a Blob or Uint8Array' }),
  }),
  filename: z.string().trim().min(1, 'filename is required'),
  purpose: z.enum(['assistants', 'vision', 'batch', 'fine-tune']),
  contentType: z.string().min(1).optional(),
});

function reject(error: z.ZodError): never {
  const [issue] = error.issues;
  const param = issue?.path.join('.') || undefined;
  throw new InvalidRequestError(issue?.message ?? 'Invalid request', { param });
}

/** Checks upload requests before anything is sent; failures are InvalidRequestError. */
export const FilesValidator = {
  validateCreate(request: FileCreateRequest): void {
    const result = fileCreateSchema.safeParse(request);
    if (!result.success) reject(result.error);
  },

  validateFileId(fileId: string): void {
    const result = fileIdSchema.safeParse(fileId);
    if (!result.success) reject(result.error);
  },
};
