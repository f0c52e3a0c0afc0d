import Papa from 'papaparse';
import { createDiagnostic } from '../records/diagnostics.js';
import type { Diagnostic, RawRecord, RawValue, SourceFormat } from '../records/types.js';

export type CsvFormat = Extract<SourceFormat, 'scopus-csv' | 'ieee-csv'>;

export interface CsvParseResult {
  records: RawRecord[];
  diagnostics: Diagnostic[];
}

function buildFields(header: string[], row: string[]): Record<string, RawValue> {
  const collected = new Map<string, string[]>();
  header.forEach((name, column) => {
    const cell = (row[column] ?? '').trim();
    if (!name || !cell) return;
    const values = collected.get(name);
    if (values) {
      values.push(cell);
    } else {
      collected.set(name, [cell]);
    }
  });

  const fields: Record<string, RawValue> = {};
  for (const [name, values] of collected) {
    fields[name] = values.length === 1 ? values[0] : Object.freeze(values);
  }
  return fields;
}

/**
 * Parses a comma-separated export whose first row names the columns.
 * Rows whose column count differs from the header's are skipped and reported; the rest of the file still parses.
 */
export function parseCsv(text: string, format: CsvFormat): CsvParseResult {
  const parsed = Papa.parse<string[]>(text, {
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const records: RawRecord[] = [];
  const diagnostics: Diagnostic[] = [];
  const [headerRow, ...rows] = parsed.data;
  if (!headerRow) {
    return { records, diagnostics };
  }

  const header = headerRow.map((name) => name.trim());

  const quoteErrors = new Map<number, string>();
  for (const error of parsed.errors) {
    if (typeof error.row === 'number' && error.row > 0 && !quoteErrors.has(error.row)) {
      quoteErrors.set(error.row, error.message);
    }
  }

  rows.forEach((row, i) => {
    const dataIndex = i + 1;
    const location = { kind: 'row' as const, index: dataIndex + 1 };

    const quoteError = quoteErrors.get(dataIndex);
    if (quoteError) {
      diagnostics.push(createDiagnostic(format, 'parse', location, `malformed row: ${quoteError}`));
      return;
    }
    if (row.length !== header.length) {
      diagnostics.push(
        createDiagnostic(
          format,
          'parse',
          location,
          `malformed row: expected ${header.length} columns, found ${row.length}`
        )
      );
      return;
    }

    records.push(
      Object.freeze({
        format,
        location: Object.freeze(location),
        fields: Object.freeze(buildFields(header, row)),
      })
    );
  });

  return { records, diagnostics };
}
