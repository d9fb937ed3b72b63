/**
 * Document-related domain entities
 */
export const DOCUMENT_FORMATS = ['txt', 'markdown', 'docx', 'pdf'] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export interface UploadedDocument {
  bytes: Uint8Array;
  filename?: string;
  mimeType?: string;
  /** Declared format tag; detected from filename/MIME type when absent */
  format?: string;
}
