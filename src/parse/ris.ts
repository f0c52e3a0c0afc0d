import type { RawRecord, RawValue } from '../records/types.js';

const TAG_LINE = /^([A-Z0-9]{1,4}) *- ?(.*)$/;
const END_TAG = 'ER';
const TYPE_TAG = 'TY';

interface PendingRecord {
  line: number;
  fields: Map<string, string[]>;
  lastTag?: string;
}

function freezeRecord(pending: PendingRecord): RawRecord {
  const fields: Record<string, RawValue> = {};
  for (const [tag, values] of pending.fields) {
    fields[tag] = values.length === 1 ? values[0] : Object.freeze([...values]);
  }
  return Object.freeze({
    format: 'ris' as const,
    location: Object.freeze({ kind: 'line' as const, index: pending.line }),
    fields: Object.freeze(fields),
  });
}

/**
 * Parses RIS and MEDLINE-tagged exports (`TY  - JOUR`, `PMID- 123`). Records end at a blank line or `ER`.
 * Repeated tags become sequences; unknown tags are kept as they are.
 */
export function parseRis(text: string): RawRecord[] {
  const records: RawRecord[] = [];
  let current: PendingRecord | undefined;

  const flush = () => {
    if (current && current.fields.size > 0) {
      records.push(freezeRecord(current));
    }
    current = undefined;
  };

  const lines = text.split(/\r\n|\r|\n/);
  lines.forEach((rawLine, i) => {
    const lineNumber = i + 1;
    if (rawLine.trim() === '') {
      flush();
      return;
    }

    const isContinuation = /^\s/.test(rawLine);
    const match = isContinuation ? null : rawLine.match(TAG_LINE);

    if (!match) {
      // Wrapped value: glue onto the last value of the previous tag.
      if (current?.lastTag) {
        const values = current.fields.get(current.lastTag);
        if (values && values.length > 0) {
          const last = values[values.length - 1];
          const extra = rawLine.trim();
          values[values.length - 1] = last ? `${last} ${extra}` : extra;
        }
      }
      return;
    }

    const tag = match[1];
    const value = match[2].trim();

    if (tag === END_TAG) {
      flush();
      return;
    }
    if (tag === TYPE_TAG && current && current.fields.size > 0) {
      flush();
    }
    if (!current) {
      current = { line: lineNumber, fields: new Map() };
    }

    const values = current.fields.get(tag);
    if (values) {
      values.push(value);
    } else {
      current.fields.set(tag, [value]);
    }
    current.lastTag = tag;
  });

  flush();
  return records;
}
