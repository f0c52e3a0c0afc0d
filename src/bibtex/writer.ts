import { DEFAULT_ENCODING, isRepresentable } from '../parse/decode.js';
import { createDiagnostic } from '../records/diagnostics.js';
import type { CanonicalRecord, Diagnostic, SourceFormat, SourceLocation } from '../records/types.js';
import { baseCitationKey, type CitationKeyRegistry } from './citationKey.js';

export interface LocatedRecord {
  record: CanonicalRecord;
  location: SourceLocation;
}

export interface WrittenEntry {
  key: string;
  record: CanonicalRecord;
}

export interface WriteOptions {
  format: SourceFormat;
  /** Per-run registry; keys issued here are never reused within the file. */
  keys: CitationKeyRegistry;
  encoding?: string;
}

export interface WriteResult {
  text: string;
  entries: WrittenEntry[];
  diagnostics: Diagnostic[];
}

type FieldWriter = [name: string, read: (record: CanonicalRecord) => string | undefined];

const AUTHOR_SEPARATOR = ' and ';
const KEYWORD_SEPARATOR = ', ';

function formatPages(pages: string | undefined): string | undefined {
  if (!pages) return pages;
  return pages.replace(/^(\w+)\s*(?:-|–|—)+\s*(\w+)$/, '$1--$2');
}

function joined(items: string[], separator: string): string | undefined {
  return items.length > 0 ? items.join(separator) : undefined;
}

const FIELD_WRITERS: FieldWriter[] = [
  ['author', (r) => joined(r.authors, AUTHOR_SEPARATOR)],
  ['title', (r) => r.title],
  ['journal', (r) => r.journal],
  ['booktitle', (r) => r.booktitle],
  ['year', (r) => r.year],
  ['volume', (r) => r.volume],
  ['number', (r) => r.issue],
  ['pages', (r) => formatPages(r.pages)],
  ['publisher', (r) => r.publisher],
  ['issn', (r) => r.issn],
  ['isbn', (r) => r.isbn],
  ['doi', (r) => r.doi],
  ['url', (r) => r.url],
  ['language', (r) => r.language],
  ['keywords', (r) => joined(r.keywords, KEYWORD_SEPARATOR)],
  ['abstract', (r) => r.abstract],
  ['note', (r) => r.note],
];

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function hasBalancedBraces(value: string): boolean {
  let depth = 0;
  for (const ch of value) {
    if (ch === '{') depth++;
    if (ch === '}') depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
}

/** Field name/value pairs in output order, absent and empty fields left out. */
export function entryFields(record: CanonicalRecord): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  for (const [name, read] of FIELD_WRITERS) {
    const value = read(record);
    if (value === undefined) continue;
    const clean = collapseWhitespace(value);
    if (clean) fields.push([name, clean]);
  }
  return fields;
}

export function renderEntry(record: CanonicalRecord, key: string): string {
  const lines = [`@${record.entryType}{${key},`];
  const fields = entryFields(record);
  fields.forEach(([name, value], i) => {
    lines.push(`  ${name} = {${value}}${i < fields.length - 1 ? ',' : ''}`);
  });
  lines.push('}');
  return lines.join('\n');
}

/**
 * Returns why the record cannot be written, or undefined when it can.
 */
export function checkSerializable(record: CanonicalRecord, encoding: string = DEFAULT_ENCODING): string | undefined {
  if (!/^[a-z]+$/.test(record.entryType)) {
    return `invalid entry type "${record.entryType}"`;
  }
  for (const [name, value] of entryFields(record)) {
    if (!hasBalancedBraces(value)) {
      return `unbalanced braces in ${name}`;
    }
    if (!isRepresentable(value, encoding)) {
      return `${name} contains characters not representable in ${encoding}`;
    }
  }
  return undefined;
}

/**
 * Serializes records to BibTeX in the given order. A record that cannot be written is reported and
 * skipped without consuming a citation key.
 */
export function writeBibliography(records: readonly LocatedRecord[], opts: WriteOptions): WriteResult {
  const encoding = opts.encoding ?? DEFAULT_ENCODING;
  const entries: WrittenEntry[] = [];
  const chunks: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const { record, location } of records) {
    const problem = checkSerializable(record, encoding);
    if (problem) {
      diagnostics.push(createDiagnostic(opts.format, 'write', location, problem));
      continue;
    }
    const key = opts.keys.issue(baseCitationKey(record));
    entries.push({ key, record });
    chunks.push(renderEntry(record, key));
  }

  const text = chunks.length > 0 ? `${chunks.join('\n\n')}\n` : '';
  return { text, entries, diagnostics };
}
