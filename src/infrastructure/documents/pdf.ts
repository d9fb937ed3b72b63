import { GlobalWorkerOptions, VerbosityLevel, getDocument } from 'pdfjs-dist';
import { TransformerError, errorMessage } from '../../core/errors/TransformerError.js';

// Node has no Web Worker, so pdf.js runs its worker module in-process
GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

/**
 * Plain text of every page, pages separated by a newline
 */
export async function extractPdfText(bytes: Uint8Array): Promise<string> {
  // pdf.js takes ownership of the buffer it is given
  const loadingTask = getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    verbosity: VerbosityLevel.ERRORS,
  });

  try {
    const pdf = await loadingTask.promise;
    const pages: string[] = [];

    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if ('str' in item) {
          text += item.str;
          if (item.hasEOL) {
            text += '\n';
          }
        }
      }
      pages.push(text);
    }

    return pages.join('\n').trim();
  } catch (error) {
    const reason =
      error instanceof Error && error.name === 'PasswordException'
        ? 'the PDF is password-protected'
        : errorMessage(error);
    throw new TransformerError('ExtractionFailed', `Could not read PDF document: ${reason}`, {
      cause: error,
    });
  } finally {
    await loadingTask.destroy();
  }
}
