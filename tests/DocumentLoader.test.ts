import * as mammoth from 'mammoth';
import { DocumentLoader, detectFormat, parseFormat } from '../src/infrastructure/documents/DocumentLoader.js';
import { TransformerError } from '../src/core/errors/TransformerError.js';

jest.mock('mammoth', () => ({ extractRawText: jest.fn() }));

const extractRawText = jest.mocked(mammoth.extractRawText);

/**
 * Single-page PDF with one line of Helvetica text
 */
function buildPdf(text: string): Uint8Array {
  const content = `BT /F1 18 Tf 20 100 Td (${text}) Tj ET`;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 300 144] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new Uint8Array(Buffer.from(pdf, 'latin1'));
}

describe('Format detection', () => {
  test('should normalize declared format tags', () => {
    expect(parseFormat('MD')).toBe('markdown');
    expect(parseFormat('.PDF')).toBe('pdf');
    expect(parseFormat(' txt ')).toBe('txt');
  });

  test('should reject unknown format tags', () => {
    expect(() => parseFormat('rtf')).toThrow(
      'Unsupported file format "rtf". Supported formats: TXT, Markdown, DOCX, PDF.'
    );
  });

  test('should detect the format from the extension first', () => {
    expect(detectFormat('notes.Markdown', 'application/pdf')).toBe('markdown');
    expect(detectFormat('report.docx')).toBe('docx');
  });

  test('should fall back to the MIME type', () => {
    expect(detectFormat(undefined, 'application/pdf; charset=binary')).toBe('pdf');
    expect(detectFormat('upload', 'text/plain')).toBe('txt');
  });

  test('should reject files it cannot identify', () => {
    expect(() => detectFormat('file.bin', 'application/octet-stream')).toThrow(
      'Unsupported file "file.bin" (application/octet-stream). Supported formats: TXT, Markdown, DOCX, PDF.'
    );
  });
});

describe('DocumentLoader', () => {
  const loader = new DocumentLoader();

  beforeEach(() => {
    extractRawText.mockReset();
  });

  test('should decode plain text and markdown as UTF-8', async () => {
    await expect(loader.load(Buffer.from('héllo\nworld'), 'txt')).resolves.toBe('héllo\nworld');
    await expect(loader.load(Buffer.from('# Title'), 'md')).resolves.toBe('# Title');
  });

  test('should reject bytes that are not valid UTF-8', async () => {
    await expect(loader.load(new Uint8Array([0x48, 0xc3, 0x28]), 'txt')).rejects.toMatchObject({
      kind: 'ExtractionFailed',
      message: 'File is not valid UTF-8 text',
    });
  });

  test('should reject unsupported format tags', async () => {
    await expect(loader.load(Buffer.from('x'), 'rtf')).rejects.toBeInstanceOf(TransformerError);
    await expect(loader.load(Buffer.from('x'), 'rtf')).rejects.toMatchObject({ kind: 'UnsupportedFormat' });
  });

  test('should extract DOCX text through mammoth', async () => {
    extractRawText.mockResolvedValue({ value: 'Docx body', messages: [] });

    await expect(loader.load(Buffer.from('PK docx bytes'), 'docx')).resolves.toBe('Docx body');
    expect(extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('PK docx bytes') });
  });

  test('should report unreadable DOCX files', async () => {
    extractRawText.mockRejectedValue(new Error('bad zip'));

    await expect(loader.load(Buffer.from('nope'), 'docx')).rejects.toMatchObject({
      kind: 'ExtractionFailed',
      message: 'Could not read DOCX document: bad zip',
    });
  });

  test('should extract PDF text', async () => {
    const text = await loader.load(buildPdf('Hello PDF'), 'pdf');
    expect(text.replace(/\s+/g, ' ').trim()).toBe('Hello PDF');
  });

  test('should report corrupt PDF files', async () => {
    await expect(loader.load(Buffer.from('this is not a pdf'), 'pdf')).rejects.toMatchObject({
      kind: 'ExtractionFailed',
    });
    await expect(loader.load(Buffer.from('this is not a pdf'), 'pdf')).rejects.toThrow(
      /^Could not read PDF document: /
    );
  });

  test('should prefer the declared format over the filename', async () => {
    const text = await loader.loadUpload({ bytes: Buffer.from('plain'), filename: 'x.pdf', format: 'txt' });
    expect(text).toBe('plain');
  });

  test('should detect the upload format when none is declared', async () => {
    const text = await loader.loadUpload({ bytes: Buffer.from('notes'), filename: 'notes.md' });
    expect(text).toBe('notes');
  });
});
