import fs from 'fs/promises';
import path from 'path';
import { IOutputWriter } from '../../core/interfaces/IOutputWriter.js';
import { TransformerError, errorMessage } from '../../core/errors/TransformerError.js';

/**
 * Writes transformed text into the user's download folder
 */
export class OutputFileWriter implements IOutputWriter {
  async write(directory: string, filename: string, text: string): Promise<string> {
    // Only the base name is honoured so a filename cannot escape the folder
    const safeName = path.basename(filename.trim());
    if (!safeName || safeName === '.' || safeName === '..') {
      throw new TransformerError('InvalidRequest', `Invalid filename: "${filename}"`);
    }

    const target = path.resolve(directory, safeName);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, text, 'utf-8');
    } catch (error) {
      throw new TransformerError('OutputSaveFailed', `Could not save ${target}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return target;
  }
}
