export const DEFAULT_OUTPUT_FILENAME = 'transformed_text.txt';

const MAX_FILENAME_LENGTH = 255;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in the form YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Suggest a filename from the first words of the text, e.g.
 * "A fox runs." -> "A_fox_runs__20261019_184500.txt"
 */
export function suggestFilename(text: string, now: Date = new Date(), extension: string = 'txt'): string {
  const firstLine = text.split('\n', 1)[0].trim();
  const words = firstLine.split(/\s+/).filter(Boolean).slice(0, 5);
  const base = words.join('_').replace(/[^\p{L}\p{N}_]/gu, '_') || 'transformed_text';
  const timestamp = formatTimestamp(now);

  const filename = `${base}_${timestamp}.${extension}`;
  if (filename.length > MAX_FILENAME_LENGTH) {
    return `${base.slice(0, 50)}_${timestamp}.${extension}`;
  }
  return filename;
}
