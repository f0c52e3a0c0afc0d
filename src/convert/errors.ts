export type ConversionErrorCode =
  | 'UNKNOWN_FORMAT'
  | 'MAPPING_MISSING'
  | 'MAPPING_INVALID'
  | 'UNKNOWN_ENCODING'
  | 'INPUT_UNREADABLE'
  | 'OUTPUT_UNWRITABLE';

/**
 * Run-level failure. Anything thrown as a ConversionError aborts the whole conversion;
 * record-level problems are reported as diagnostics instead.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.code = code;
  }
}

export function isConversionError(err: unknown): err is ConversionError {
  return err instanceof ConversionError;
}

export function formatError(err: unknown): string {
  if (err instanceof ConversionError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.stack || err.message;
  return String(err);
}
