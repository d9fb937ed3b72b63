import path from 'path';
import * as mammoth from 'mammoth';
import { IDocumentLoader } from '../../core/interfaces/IDocumentLoader.js';
import { DOCUMENT_FORMATS, DocumentFormat, UploadedDocument } from '../../core/entities/Document.js';
import { TransformerError, errorMessage } from '../../core/errors/TransformerError.js';
import { extractPdfText } from './pdf.js';

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.txt': 'txt',
  '.text': 'txt',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.docx': 'docx',
  '.pdf': 'pdf',
};

const MIME_FORMATS: Record<string, DocumentFormat> = {
  'text/plain': 'txt',
  'text/markdown': 'markdown',
  'text/x-markdown': 'markdown',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'application/pdf': 'pdf',
};

/**
 * Validate a declared format tag
 */
export function parseFormat(tag: string): DocumentFormat {
  const normalized = tag.trim().toLowerCase().replace(/^\./, '');
  const format = normalized === 'md' ? 'markdown' : normalized;
  const known = DOCUMENT_FORMATS.find((candidate) => candidate === format);
  if (!known) {
    throw new TransformerError(
      'UnsupportedFormat',
      `Unsupported file format "${tag}". Supported formats: TXT, Markdown, DOCX, PDF.`
    );
  }
  return known;
}

/**
 * Work out the format of an upload from its extension, then its MIME type
 */
export function detectFormat(filename?: string, mimeType?: string): DocumentFormat {
  const ext = filename ? path.extname(filename).toLowerCase() : '';
  if (ext && EXTENSION_FORMATS[ext]) {
    return EXTENSION_FORMATS[ext];
  }

  const mime = mimeType?.split(';')[0].trim().toLowerCase();
  if (mime && MIME_FORMATS[mime]) {
    return MIME_FORMATS[mime];
  }

  throw new TransformerError(
    'UnsupportedFormat',
    `Unsupported file ${filename ? `"${filename}"` : 'upload'}${mime ? ` (${mime})` : ''}. Supported formats: TXT, Markdown, DOCX, PDF.`
  );
}

/**
 * Extracts plain text from TXT, Markdown, DOCX and PDF uploads
 */
export class DocumentLoader implements IDocumentLoader {
  async load(bytes: Uint8Array, format: string): Promise<string> {
    const documentFormat = parseFormat(format);

    switch (documentFormat) {
      case 'txt':
      case 'markdown':
        return decodeUtf8(bytes);
      case 'docx':
        return extractDocxText(bytes);
      case 'pdf':
        return extractPdfText(bytes);
    }
  }

  async loadUpload(document: UploadedDocument): Promise<string> {
    const format = document.format
      ? parseFormat(document.format)
      : detectFormat(document.filename, document.mimeType);
    return this.load(document.bytes, format);
  }
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new TransformerError('ExtractionFailed', 'File is not valid UTF-8 text', { cause: error });
  }
}

async function extractDocxText(bytes: Uint8Array): Promise<string> {
  try {
    const { value } = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
    return value;
  } catch (error) {
    throw new TransformerError(
      'ExtractionFailed',
      `Could not read DOCX document: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
