export const SOURCE_FORMATS = ['ris', 'scopus-csv', 'ieee-csv'] as const;

export type SourceFormat = (typeof SOURCE_FORMATS)[number];

export const FORMAT_ALIASES: Readonly<Record<string, SourceFormat>> = {
  pubmed: 'ris',
  scopus: 'scopus-csv',
  ieee: 'ieee-csv',
};

export type RawValue = string | readonly string[];

export interface SourceLocation {
  kind: 'line' | 'row';
  /** 1-based; CSV rows count the header as row 1. */
  index: number;
}

export interface RawRecord {
  readonly format: SourceFormat;
  readonly location: SourceLocation;
  readonly fields: Readonly<Record<string, RawValue>>;
}

export const SEQUENCE_FIELDS = ['authors', 'keywords'] as const;

export const SCALAR_FIELDS = [
  'entryType',
  'title',
  'year',
  'journal',
  'booktitle',
  'volume',
  'issue',
  'pages',
  'publisher',
  'issn',
  'isbn',
  'doi',
  'url',
  'language',
  'abstract',
  'note',
] as const;

export type SequenceField = (typeof SEQUENCE_FIELDS)[number];
export type ScalarField = (typeof SCALAR_FIELDS)[number];
export type CanonicalField = SequenceField | ScalarField;

export const CANONICAL_FIELDS = [...SCALAR_FIELDS, ...SEQUENCE_FIELDS] as const;

export interface CanonicalRecord {
  entryType: string;
  title: string;
  authors: string[];
  keywords: string[];
  year?: string;
  journal?: string;
  booktitle?: string;
  volume?: string;
  issue?: string;
  pages?: string;
  publisher?: string;
  issn?: string;
  isbn?: string;
  doi?: string;
  url?: string;
  language?: string;
  abstract?: string;
  note?: string;
}

export type DiagnosticStage = 'parse' | 'normalize' | 'write';

export type Diagnostic = {
  format: SourceFormat;
  stage: DiagnosticStage;
  location: SourceLocation;
  reason: string;
};

export function isSequenceField(field: CanonicalField): field is SequenceField {
  return field === 'authors' || field === 'keywords';
}

export function resolveFormat(name: string): SourceFormat | undefined {
  const key = name.trim().toLowerCase();
  const direct = SOURCE_FORMATS.find((format) => format === key);
  if (direct) return direct;
  return Object.hasOwn(FORMAT_ALIASES, key) ? FORMAT_ALIASES[key] : undefined;
}
