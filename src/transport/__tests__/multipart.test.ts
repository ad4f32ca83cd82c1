import { describe, it, expect } from 'vitest';
import { contentTypeFor, createUploadForm } from '../multipart.js';

describe('createUploadForm', () => {
  it('should put the document under file followed by the fields', () => {
    const form = createUploadForm(
      { content: new TextEncoder().encode('x = 1'), filename: 'notes.txt' },
      { purpose: 'assistants' }
    );

    expect([...form.keys()]).toEqual(['file', 'purpose']);
    expect(form.get('purpose')).toBe('assistants');
  });

  it('should type raw bytes from the filename', () => {
    const form = createUploadForm({ content: new Uint8Array([37, 80, 68, 70]), filename: 'Report.PDF' });
    const file = form.get('file');

    expect(file instanceof Blob ? [file.type, file.size] : null).toEqual(['application/pdf', 4]);
  });

  it('should prefer an explicit content type', () => {
    const form = createUploadForm({ content: new Uint8Array([1]), filename: 'data.txt', contentType: 'text/csv' });
    const file = form.get('file');

    expect(file instanceof Blob ? file.type : null).toBe('text/csv');
  });

  it('should keep the type of a blob as given', () => {
    const form = createUploadForm({ content: new Blob(['{}'], { type: 'application/json' }), filename: 'a.bin' });
    const file = form.get('file');

    expect(file instanceof Blob ? file.type : null).toBe('application/json');
  });
});

describe('contentTypeFor', () => {
  it('should fall back to octet-stream for unknown or missing extensions', () => {
    expect([contentTypeFor('archive.xyz'), contentTypeFor('README'), contentTypeFor('lesson.md')]).toEqual([
      'application/octet-stream',
      'application/octet-stream',
      'text/markdown',
    ]);
  });
});
