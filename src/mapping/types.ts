import type { SourceFormat } from '../records/types.js';
import type { MappingRuleEntry } from './schema.js';

export type MappingRule = MappingRuleEntry & {
  /** Source field name as it appears in the export. */
  source: string;
};

export interface FieldMappingTable {
  readonly format: SourceFormat;
  readonly defaultEntryType: string;
  /** In declaration order; order decides fallback priority. */
  readonly rules: readonly MappingRule[];
}

