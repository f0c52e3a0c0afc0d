import iconv from 'iconv-lite';
import { ConversionError } from '../convert/errors.js';

export const DEFAULT_ENCODING = 'utf-8';

export function assertEncoding(encoding: string): void {
  if (!iconv.encodingExists(encoding)) {
    throw new ConversionError('UNKNOWN_ENCODING', `Unsupported character encoding: ${encoding}`);
  }
}

/**
 * Decodes export bytes. A leading byte-order mark is dropped; Scopus exports carry one.
 */
export function decodeInput(buffer: Buffer, encoding: string = DEFAULT_ENCODING): string {
  assertEncoding(encoding);
  const text = iconv.decode(buffer, encoding, { stripBOM: true });
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function encodeOutput(text: string, encoding: string = DEFAULT_ENCODING): Buffer {
  assertEncoding(encoding);
  return iconv.encode(text, encoding);
}

/**
 * True when the text survives an encode/decode round trip, i.e. every character exists in the target encoding.
 */
export function isRepresentable(text: string, encoding: string = DEFAULT_ENCODING): boolean {
  return iconv.decode(iconv.encode(text, encoding), encoding) === text;
}
