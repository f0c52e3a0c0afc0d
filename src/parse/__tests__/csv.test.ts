import { describe, it, expect } from 'vitest';
import { parseCsv } from '../csv.js';

describe('parseCsv', () => {
  it('should key each row by the header', () => {
    const text = ['Title,Authors,Year', '"A, quoted title",Doe J.,2020', 'Third,,2018', ''].join('\n');

    const { records, diagnostics } = parseCsv(text, 'scopus-csv');
    expect(diagnostics).toEqual([]);
    expect(records).toHaveLength(2);
    expect(records[0].fields).toEqual({ Title: 'A, quoted title', Authors: 'Doe J.', Year: '2020' });
    expect(records[0].location).toEqual({ kind: 'row', index: 2 });
    expect(records[1].fields).toEqual({ Title: 'Third', Year: '2018' });
    expect(records[1].location).toEqual({ kind: 'row', index: 3 });
  });

  it('should skip a row with the wrong column count and keep going', () => {
    const text = ['Title,Authors,Year', 'First,Doe J.,2020', 'Second,Roe R.,2019,extra', 'Third,Poe P.,2018'].join(
      '\n'
    );

    const { records, diagnostics } = parseCsv(text, 'ieee-csv');
    expect(records.map((r) => r.fields.Title)).toEqual(['First', 'Third']);
    expect(diagnostics).toEqual([
      {
        format: 'ieee-csv',
        stage: 'parse',
        location: { kind: 'row', index: 3 },
        reason: 'malformed row: expected 3 columns, found 4',
      },
    ]);
  });

  it('should keep quoted newlines inside a field', () => {
    const text = 'Title,Abstract\nMultiline,"first line\nsecond line"\n';
    expect(parseCsv(text, 'scopus-csv').records[0].fields.Abstract).toBe('first line\nsecond line');
  });

  it('should trim header names', () => {
    const text = ' Title , Year \nTrimmed,2021\n';
    expect(parseCsv(text, 'scopus-csv').records[0].fields).toEqual({ Title: 'Trimmed', Year: '2021' });
  });

  it('should turn repeated header names into sequences', () => {
    const text = 'Title,Keyword,Keyword\nRepeated,alpha,beta\n';
    expect(parseCsv(text, 'ieee-csv').records[0].fields.Keyword).toEqual(['alpha', 'beta']);
  });

  it('should return nothing for a header-only file', () => {
    expect(parseCsv('Title,Year\n', 'scopus-csv')).toEqual({ records: [], diagnostics: [] });
  });
});
