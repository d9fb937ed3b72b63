/**
 * Error kinds surfaced to the user or to API callers.
 */
export type ErrorKind =
  | 'UnsupportedFormat'
  | 'ExtractionFailed'
  | 'UnknownTransformation'
  | 'ServiceUnreachable'
  | 'ModelNotFound'
  | 'GenerationFailed'
  | 'PreferenceLoadFailed'
  | 'PreferenceSaveFailed'
  | 'EmptyInput'
  | 'EmptyOutput'
  | 'OutputSaveFailed'
  | 'SessionBusy'
  | 'SessionNotFound'
  | 'InvalidRequest';

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
}

export class TransformerError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransformerError';
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message };
  }
}

export function isTransformerError(error: unknown, kind?: ErrorKind): error is TransformerError {
  return error instanceof TransformerError && (kind === undefined || error.kind === kind);
}

/**
 * Message of an arbitrary thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
