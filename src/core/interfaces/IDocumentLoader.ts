import { UploadedDocument } from '../entities/Document.js';

/**
 * Interface for plain-text extraction from uploaded files
 */
export interface IDocumentLoader {
  load(bytes: Uint8Array, format: string): Promise<string>;

  loadUpload(document: UploadedDocument): Promise<string>;
}
