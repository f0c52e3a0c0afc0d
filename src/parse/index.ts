import type { Diagnostic, RawRecord, SourceFormat } from '../records/types.js';
import { parseCsv } from './csv.js';
import { parseRis } from './ris.js';

export interface ParseResult {
  records: RawRecord[];
  diagnostics: Diagnostic[];
}

export function parseRecords(text: string, format: SourceFormat): ParseResult {
  switch (format) {
    case 'ris':
      return { records: parseRis(text), diagnostics: [] };
    case 'scopus-csv':
    case 'ieee-csv':
      return parseCsv(text, format);
  }
}

export { parseCsv } from './csv.js';
export { parseRis } from './ris.js';
export { decodeInput, encodeOutput, isRepresentable, DEFAULT_ENCODING } from './decode.js';
