import { applyTransform, type TransformResult } from '../mapping/transforms.js';
import type { FieldMappingTable, MappingRule } from '../mapping/types.js';
import {
  CANONICAL_FIELDS,
  isSequenceField,
  type CanonicalField,
  type CanonicalRecord,
  type RawRecord,
  type RawValue,
  type ScalarField,
  type SequenceField,
} from '../records/types.js';

export type NormalizeOutcome =
  | { ok: true; record: CanonicalRecord }
  | { ok: false; reason: string };

export const MISSING_TITLE = 'missing title';

const SCALAR_JOIN = '; ';
const PROCEEDINGS_TYPES = new Set(['inproceedings', 'incollection', 'inbook']);

function fieldValue(raw: RawRecord, name: string): RawValue | undefined {
  return Object.hasOwn(raw.fields, name) ? raw.fields[name] : undefined;
}

function hasContent(value: RawValue | undefined): value is RawValue {
  if (value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  return value.some((item) => item.trim().length > 0);
}

function matching(value: RawValue | undefined, pattern: RegExp | undefined): RawValue | undefined {
  if (value === undefined || !pattern) return value;
  const items: readonly string[] = typeof value === 'string' ? [value] : value;
  const kept = items.filter((item) => pattern.test(item));
  if (kept.length === 0) return undefined;
  return kept.length === 1 ? kept[0] : kept;
}

function gatherValue(raw: RawRecord, rule: MappingRule): RawValue | undefined {
  const primary = matching(fieldValue(raw, rule.source), rule.match);
  if (!hasContent(primary)) return undefined;
  const extras = (rule.also ?? []).map((name) => fieldValue(raw, name)).filter(hasContent);
  if (extras.length === 0) return primary;
  return [primary, ...extras].flatMap((value) => (typeof value === 'string' ? [value] : [...value]));
}

function cleanList(items: readonly string[]): string[] {
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

function hasResult(result: TransformResult): result is string | string[] {
  if (result === undefined) return false;
  if (typeof result === 'string') return result.trim().length > 0;
  return cleanList(result).length > 0;
}

/**
 * Drops empty items and repeats; the comparison ignores case and the first spelling is kept.
 */
export function dedupe(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const item of cleanList(items)) {
    const key = item.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }
  return unique;
}

function toScalar(result: string | string[]): string {
  return typeof result === 'string' ? result.trim() : cleanList(result).join(SCALAR_JOIN);
}

function toSequence(result: string | string[]): string[] {
  return dedupe(typeof result === 'string' ? [result] : result);
}

/**
 * Walks the fallback chain for one canonical field. Rules are tried in declaration order;
 * the first whose source is present and whose transform yields something wins.
 */
function resolveField(raw: RawRecord, rules: readonly MappingRule[]): string | string[] | undefined {
  for (const rule of rules) {
    const value = gatherValue(raw, rule);
    if (value === undefined) continue;
    const result = applyTransform(rule, value);
    if (hasResult(result)) return result;
  }
  return undefined;
}

function groupRules(table: FieldMappingTable): Map<CanonicalField, MappingRule[]> {
  const grouped = new Map<CanonicalField, MappingRule[]>();
  for (const rule of table.rules) {
    const rules = grouped.get(rule.field);
    if (rules) {
      rules.push(rule);
    } else {
      grouped.set(rule.field, [rule]);
    }
  }
  return grouped;
}

/**
 * One venue per entry: articles keep `journal`, everything else keeps `booktitle` when it has one.
 * A lone venue of the wrong kind is moved for articles and proceedings-like types.
 */
function settleVenue(record: CanonicalRecord): CanonicalRecord {
  const { journal, booktitle, ...rest } = record;
  if (record.entryType === 'article') {
    const venue = journal ?? booktitle;
    return venue === undefined ? rest : { ...rest, journal: venue };
  }
  if (booktitle !== undefined) {
    return { ...rest, booktitle };
  }
  if (journal !== undefined && PROCEEDINGS_TYPES.has(record.entryType)) {
    return { ...rest, booktitle: journal };
  }
  return record;
}

/**
 * Maps a raw export record onto the canonical shape using the table for its format.
 * Source fields without a rule are dropped. Records without a title are rejected.
 */
export function normalizeRecord(raw: RawRecord, table: FieldMappingTable): NormalizeOutcome {
  const grouped = groupRules(table);
  const scalars: Partial<Record<ScalarField, string>> = {};
  const sequences: Record<SequenceField, string[]> = { authors: [], keywords: [] };

  for (const field of CANONICAL_FIELDS) {
    const rules = grouped.get(field);
    if (!rules) continue;
    const result = resolveField(raw, rules);
    if (result === undefined) continue;
    if (isSequenceField(field)) {
      sequences[field] = toSequence(result);
    } else {
      scalars[field] = toScalar(result);
    }
  }

  const title = scalars.title;
  if (!title) {
    return { ok: false, reason: MISSING_TITLE };
  }

  const entryType = (scalars.entryType ?? table.defaultEntryType).trim().toLowerCase();
  const record: CanonicalRecord = {
    ...scalars,
    entryType,
    title,
    authors: sequences.authors,
    keywords: sequences.keywords,
  };
  return { ok: true, record: settleVenue(record) };
}

/** Source fields of the record that no rule of the table reads. */
export function unmappedFields(raw: RawRecord, table: FieldMappingTable): string[] {
  const read = new Set<string>();
  for (const rule of table.rules) {
    read.add(rule.source);
    for (const name of rule.also ?? []) read.add(name);
  }
  return Object.keys(raw.fields).filter((name) => !read.has(name));
}
