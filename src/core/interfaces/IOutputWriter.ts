/**
 * Interface for writing transformed text to disk
 */
export interface IOutputWriter {
  /** Returns the absolute path written */
  write(directory: string, filename: string, text: string): Promise<string>;
}
