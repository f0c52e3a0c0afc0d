export { convertFile, convertText, requireFormat } from './convert.js';
export type { ConversionReport, ConversionSummary, ConvertFileOptions, ConvertTextOptions, ConvertTextResult } from './convert.js';
export { ConversionError, isConversionError, formatError } from './errors.js';
export type { ConversionErrorCode } from './errors.js';
export { loadMappingTable, parseMappingTable } from '../mapping/load.js';
export type { FieldMappingTable, MappingRule } from '../mapping/types.js';
export { normalizeRecord } from '../normalize/normalize.js';
export { parseRecords } from '../parse/index.js';
export { CitationKeyRegistry } from '../bibtex/citationKey.js';
export { writeBibliography, renderEntry } from '../bibtex/writer.js';
export { formatDiagnostic } from '../records/diagnostics.js';
export { resolveFormat, SOURCE_FORMATS, FORMAT_ALIASES } from '../records/types.js';
export type { CanonicalRecord, Diagnostic, RawRecord, SourceFormat } from '../records/types.js';
