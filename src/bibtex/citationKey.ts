import type { CanonicalRecord } from '../records/types.js';

const ANONYMOUS = 'anon';

function asciiFold(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
}

/**
 * `Doe, Jane` -> `doe`; `Jane Doe` -> `doe`; `J. van Dyke` -> `dyke`.
 */
export function surnameOf(author: string): string {
  const trimmed = author.trim();
  const comma = trimmed.indexOf(',');
  if (comma >= 0) return asciiFold(trimmed.slice(0, comma));
  const words = trimmed.split(/\s+/);
  return asciiFold(words[words.length - 1] ?? '');
}

export function baseCitationKey(record: CanonicalRecord): string {
  const surname = record.authors.length > 0 ? surnameOf(record.authors[0]) : '';
  const year = record.year && /^\d{4}$/.test(record.year) ? record.year : '';
  return `${surname || ANONYMOUS}${year}`;
}

/** 1 -> a, 26 -> z, 27 -> aa. */
export function collisionSuffix(n: number): string {
  let suffix = '';
  let rest = n;
  while (rest > 0) {
    const digit = (rest - 1) % 26;
    suffix = String.fromCharCode(97 + digit) + suffix;
    rest = Math.floor((rest - 1) / 26);
  }
  return suffix;
}

/**
 * Keys issued during one conversion. Create one per run and pass it along;
 * nothing is shared between runs.
 */
export class CitationKeyRegistry {
  private readonly issued = new Set<string>();

  get size(): number {
    return this.issued.size;
  }

  has(key: string): boolean {
    return this.issued.has(key);
  }

  /** First free key for the base: the base itself, then base+a, base+b, ... */
  propose(base: string): string {
    if (!this.issued.has(base)) return base;
    for (let n = 1; ; n++) {
      const candidate = `${base}${collisionSuffix(n)}`;
      if (!this.issued.has(candidate)) return candidate;
    }
  }

  reserve(key: string): void {
    if (this.issued.has(key)) {
      throw new Error(`Citation key ${key} was already issued`);
    }
    this.issued.add(key);
  }

  issue(base: string): string {
    const key = this.propose(base);
    this.reserve(key);
    return key;
  }

  keys(): string[] {
    return [...this.issued];
  }
}
