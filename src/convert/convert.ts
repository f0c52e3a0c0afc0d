import fs from 'node:fs/promises';
import path from 'node:path';
import { CitationKeyRegistry } from '../bibtex/citationKey.js';
import { writeBibliography, type LocatedRecord } from '../bibtex/writer.js';
import { debug } from '../config.js';
import { loadMappingTable } from '../mapping/load.js';
import type { FieldMappingTable } from '../mapping/types.js';
import { normalizeRecord, unmappedFields } from '../normalize/normalize.js';
import { parseRecords } from '../parse/index.js';
import { assertEncoding, decodeInput, DEFAULT_ENCODING, encodeOutput } from '../parse/decode.js';
import { createDiagnostic } from '../records/diagnostics.js';
import { resolveFormat, type Diagnostic, type SourceFormat } from '../records/types.js';
import { ConversionError } from './errors.js';

export interface ConvertTextOptions {
  table: FieldMappingTable;
  /** Output encoding; entries with characters it cannot hold are skipped. */
  encoding?: string;
}

export type ConversionReport = {
  format: SourceFormat;
  /** Entries found in the input, including the ones later skipped. */
  recordsRead: number;
  written: number;
  skipped: number;
  keys: string[];
  diagnostics: Diagnostic[];
};

export interface ConvertTextResult {
  bibtex: string;
  report: ConversionReport;
}

export interface ConvertFileOptions {
  format: string;
  inputPath: string;
  outputPath: string;
  mappingDir?: string;
  inputEncoding?: string;
  outputEncoding?: string;
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

export type ConversionSummary = ConversionReport & {
  inputPath: string;
  outputPath: string;
};

function byLocation(a: Diagnostic, b: Diagnostic): number {
  return a.location.index - b.location.index;
}

/**
 * Runs parse -> normalize -> write over one export held in memory.
 * Record-level problems end up in `report.diagnostics`; nothing here throws for a bad record.
 */
export function convertText(text: string, opts: ConvertTextOptions): ConvertTextResult {
  const { table } = opts;
  const format = table.format;
  const parsed = parseRecords(text, format);
  const diagnostics: Diagnostic[] = [...parsed.diagnostics];
  const located: LocatedRecord[] = [];

  for (const raw of parsed.records) {
    const outcome = normalizeRecord(raw, table);
    if (!outcome.ok) {
      diagnostics.push(createDiagnostic(format, 'normalize', raw.location, outcome.reason));
      continue;
    }
    const dropped = unmappedFields(raw, table);
    if (dropped.length > 0) {
      debug('normalize', `${format} ${raw.location.kind} ${raw.location.index} dropped: ${dropped.join(', ')}`);
    }
    located.push({ record: outcome.record, location: raw.location });
  }

  const keys = new CitationKeyRegistry();
  const written = writeBibliography(located, { format, keys, encoding: opts.encoding });
  diagnostics.push(...written.diagnostics);
  diagnostics.sort(byLocation);

  return {
    bibtex: written.text,
    report: {
      format,
      recordsRead: parsed.records.length + parsed.diagnostics.length,
      written: written.entries.length,
      skipped: diagnostics.length,
      keys: written.entries.map((entry) => entry.key),
      diagnostics,
    },
  };
}

export function requireFormat(name: string): SourceFormat {
  const format = resolveFormat(name);
  if (!format) {
    throw new ConversionError('UNKNOWN_FORMAT', `Unknown source format: ${name}`);
  }
  return format;
}

/**
 * Converts one export file into one BibTeX file. Throws ConversionError for run-level failures
 * (unknown format, bad mapping configuration, unreadable input, unwritable output).
 */
export async function convertFile(opts: ConvertFileOptions): Promise<ConversionSummary> {
  const format = requireFormat(opts.format);
  const inputEncoding = opts.inputEncoding ?? DEFAULT_ENCODING;
  const outputEncoding = opts.outputEncoding ?? DEFAULT_ENCODING;
  assertEncoding(inputEncoding);
  assertEncoding(outputEncoding);

  const table = await loadMappingTable(format, { mappingDir: opts.mappingDir });

  const inputPath = path.resolve(opts.inputPath);
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(inputPath);
  } catch (error) {
    throw new ConversionError('INPUT_UNREADABLE', `Cannot read input file ${inputPath}`, { cause: error });
  }

  const { bibtex, report } = convertText(decodeInput(buffer, inputEncoding), { table, encoding: outputEncoding });

  const outputPath = path.resolve(opts.outputPath);
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, encodeOutput(bibtex, outputEncoding));
  } catch (error) {
    throw new ConversionError('OUTPUT_UNWRITABLE', `Cannot write output file ${outputPath}`, { cause: error });
  }

  if (opts.onDiagnostic) {
    report.diagnostics.forEach(opts.onDiagnostic);
  }
  debug('convert', `${format}: ${report.written}/${report.recordsRead} written to ${outputPath}`);

  return { ...report, inputPath, outputPath };
}
