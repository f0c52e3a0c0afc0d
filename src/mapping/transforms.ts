import type { RawValue } from '../records/types.js';
import type { MappingRule } from './types.js';

export type TransformResult = string | string[] | undefined;

export const UNKNOWN_YEAR = 'unknown';

const NO_AUTHOR_PLACEHOLDER = '[No author name available]';
const BARE_DOI = /^10\.\d{4,9}\/\S+$/;
const DOI_URL_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)/i;
const SCOPUS_AUTHOR_ID = /\s*\(\d+\)$/;
const HAS_SCOPUS_AUTHOR_ID = /\(\d+\)/;
const SURNAME_WITH_INITIALS = /^(\S.*?)\s+((?:[A-Z]\.-?)+)$/;
const YEAR = /(?<!\d)\d{4}(?!\d)/;
const ISSN = /(?<![\dX-])\d{4}-\d{3}[\dX](?![\dX-])/i;

function toList(value: RawValue): string[] {
  return typeof value === 'string' ? [value] : [...value];
}

function toText(value: RawValue, separator: string): string {
  return typeof value === 'string' ? value : value.join(separator);
}

function nonEmpty(items: string[]): string[] {
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

export function splitValue(value: RawValue, delimiter: string): string[] {
  return nonEmpty(toList(value).flatMap((item) => item.split(delimiter)));
}

export function joinValue(value: RawValue, delimiter: string): string {
  return typeof value === 'string' ? value : nonEmpty([...value]).join(delimiter);
}

export function firstNWords(value: RawValue, n: number): string {
  const text = toText(value, ' ').trim();
  const words = text.split(/\s+/);
  if (words.length <= n) return text;
  return words.slice(0, n).join(' ');
}

/**
 * First 4-digit run in the value, e.g. `2021 Mar 15` -> `2021`. Never throws; falls back to `unknown`.
 */
export function extractYear(value: RawValue): string {
  for (const item of toList(value)) {
    const match = item.match(YEAR);
    if (match) return match[0];
  }
  return UNKNOWN_YEAR;
}

export function mapValue(value: RawValue, values: Record<string, string>, fallback?: string): string | undefined {
  for (const item of toList(value)) {
    const key = item.trim();
    if (Object.hasOwn(values, key)) return values[key];
  }
  return fallback;
}

/**
 * Picks the DOI out of an article-id list such as `S0140-6736(21)00001-1 [pii]; 10.1016/x [doi]`.
 * An id tagged `[doi]` wins over a bare DOI.
 */
export function extractDoi(value: RawValue): string | undefined {
  const ids = splitValue(value, ';');
  for (const id of ids) {
    if (id.endsWith('[doi]')) {
      const doi = id.slice(0, -'[doi]'.length).trim();
      if (doi) return doi;
    }
  }
  for (const id of ids) {
    const candidate = id.replace(DOI_URL_PREFIX, '');
    if (BARE_DOI.test(candidate)) return candidate;
  }
  return undefined;
}

/** First ISSN in the value, e.g. `1234-5678 (Linking)` -> `1234-5678`. */
export function extractIssn(value: RawValue): string | undefined {
  for (const item of toList(value)) {
    const match = item.match(ISSN);
    if (match) return match[0].toUpperCase();
  }
  return undefined;
}

function pairNames(authors: string): string[] {
  const tokens = authors.split(',').map((token) => token.trim());
  const names: string[] = [];
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    const next: string | undefined = tokens[i + 1];
    const initialled = token.match(SURNAME_WITH_INITIALS);
    if (initialled) {
      names.push(`${initialled[1]}, ${initialled[2]}`);
      i += 1;
    } else if (next !== undefined && next.includes('.')) {
      names.push(`${token}, ${next}`);
      i += 2;
    } else {
      names.push(token);
      i += 1;
    }
  }
  return nonEmpty(names);
}

/**
 * Scopus author lists. `Doe, J., Smith, A.B.` pairs surname and initials, `Doe J., Smith A.B.` is
 * rewritten to the same `Doe, J.` form;
 * full-name lists (`Doe, Jane (5720); Smith, Adam (1234)`) split on semicolons and lose the author ids.
 */
export function parseNamePairs(value: RawValue): string[] {
  const names: string[] = [];
  for (const item of toList(value)) {
    const text = item.trim();
    if (!text || text === NO_AUTHOR_PLACEHOLDER) continue;
    if (text.includes(';') || HAS_SCOPUS_AUTHOR_ID.test(text)) {
      names.push(...nonEmpty(text.split(';').map((name) => name.replace(SCOPUS_AUTHOR_ID, ''))));
    } else {
      names.push(...pairNames(text));
    }
  }
  return names;
}

export function applyTransform(rule: MappingRule, value: RawValue): TransformResult {
  switch (rule.transform) {
    case 'identity':
      return typeof value === 'string' ? value : [...value];
    case 'split':
      return splitValue(value, rule.argument);
    case 'join':
      return joinValue(value, rule.argument);
    case 'first-n-words':
      return firstNWords(value, rule.argument);
    case 'year-extract':
      return extractYear(value);
    case 'value-map':
      return mapValue(value, rule.values, rule.default);
    case 'doi-extract':
      return extractDoi(value);
    case 'name-pairs':
      return parseNamePairs(value);
    case 'issn-extract':
      return extractIssn(value);
  }
}
