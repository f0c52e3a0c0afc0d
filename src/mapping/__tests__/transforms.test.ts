import { describe, it, expect } from 'vitest';
import {
  applyTransform,
  extractDoi,
  extractIssn,
  extractYear,
  firstNWords,
  joinValue,
  mapValue,
  parseNamePairs,
  splitValue,
  UNKNOWN_YEAR,
} from '../transforms.js';

describe('transforms', () => {
  describe('splitValue', () => {
    it('should split on the delimiter and drop empty pieces', () => {
      expect(splitValue('machine learning; ;deep learning;', ';')).toEqual(['machine learning', 'deep learning']);
    });

    it('should split every element of a sequence in order', () => {
      expect(splitValue(['a;b', 'c'], ';')).toEqual(['a', 'b', 'c']);
    });
  });

  describe('joinValue', () => {
    it('should join a sequence', () => {
      expect(joinValue(['101', '109'], '--')).toBe('101--109');
    });

    it('should leave a single string alone', () => {
      expect(joinValue('101', '--')).toBe('101');
    });
  });

  describe('firstNWords', () => {
    it('should keep only the first n words', () => {
      expect(firstNWords('one two  three four', 2)).toBe('one two');
    });

    it('should return short text unchanged', () => {
      expect(firstNWords('one two', 5)).toBe('one two');
    });
  });

  describe('extractYear', () => {
    it('should pull the year out of a free-text date', () => {
      expect(extractYear('2021 Mar 15')).toBe('2021');
      expect(extractYear('2019///')).toBe('2019');
    });

    it('should look through every element of a sequence', () => {
      expect(extractYear(['n.d.', 'c. 1999'])).toBe('1999');
    });

    it('should fall back to the placeholder when there is no 4-digit run', () => {
      expect(extractYear('Spring issue')).toBe(UNKNOWN_YEAR);
      expect(extractYear('')).toBe('unknown');
    });

    it('should not take four digits out of a longer number', () => {
      expect(extractYear('12345')).toBe(UNKNOWN_YEAR);
      expect(extractYear('article 123456, published 2020')).toBe('2020');
    });
  });

  describe('mapValue', () => {
    const values = { 'Journal Article': 'article', Congress: 'inproceedings' };

    it('should use the first element that has a mapping', () => {
      expect(mapValue(['Research Support', 'Congress', 'Journal Article'], values)).toBe('inproceedings');
    });

    it('should fall back to the default', () => {
      expect(mapValue('Preprint', values, 'misc')).toBe('misc');
      expect(mapValue('Preprint', values)).toBeUndefined();
    });

    it('should ignore names inherited from Object.prototype', () => {
      expect(mapValue('constructor', values)).toBeUndefined();
      expect(mapValue(['toString', 'hasOwnProperty'], values, 'misc')).toBe('misc');
    });
  });

  describe('extractDoi', () => {
    it('should prefer the id tagged [doi]', () => {
      expect(extractDoi('S0140-6736(21)00001-1 [pii]; 10.1016/S0140-6736(21)00001-1 [doi]')).toBe(
        '10.1016/S0140-6736(21)00001-1'
      );
    });

    it('should accept bare DOIs and doi.org links', () => {
      expect(extractDoi('10.1109/5.771073')).toBe('10.1109/5.771073');
      expect(extractDoi('https://doi.org/10.1109/5.771073')).toBe('10.1109/5.771073');
    });

    it('should return undefined when no DOI is present', () => {
      expect(extractDoi('31234567 [pubmed]')).toBeUndefined();
    });
  });

  describe('extractIssn', () => {
    it('should take the ISSN out of a MEDLINE IS value', () => {
      expect(extractIssn('1234-5678 (Linking)')).toBe('1234-5678');
      expect(extractIssn(['1234-567x (Electronic)', '1234-5678 (Print)'])).toBe('1234-567X');
    });

    it('should return undefined for an issue number or an ISBN', () => {
      expect(extractIssn('3')).toBeUndefined();
      expect(extractIssn('978-1-0000-0000-0')).toBeUndefined();
    });
  });

  describe('parseNamePairs', () => {
    it('should pair surnames with initials', () => {
      expect(parseNamePairs('Doe, J., Smith, A.B.')).toEqual(['Doe, J.', 'Smith, A.B.']);
    });

    it('should split surnames that already carry their initials', () => {
      expect(parseNamePairs('Doe J., Roe R.')).toEqual(['Doe, J.', 'Roe, R.']);
      expect(parseNamePairs('van der Berg A.B., Lee J.-H., Smith, C.')).toEqual([
        'van der Berg, A.B.',
        'Lee, J.-H.',
        'Smith, C.',
      ]);
    });

    it('should keep a trailing name without initials', () => {
      expect(parseNamePairs('Doe, J., Consortium')).toEqual(['Doe, J.', 'Consortium']);
    });

    it('should split full-name lists and drop author ids', () => {
      expect(parseNamePairs('Doe, Jane (57200000001); Smith, Adam B. (57200000002)')).toEqual([
        'Doe, Jane',
        'Smith, Adam B.',
      ]);
      expect(parseNamePairs('Doe, Jane (57200000001)')).toEqual(['Doe, Jane']);
    });

    it('should treat the missing-author placeholder as no authors', () => {
      expect(parseNamePairs('[No author name available]')).toEqual([]);
    });
  });

  describe('applyTransform', () => {
    it('should copy sequences for identity', () => {
      const value = ['Doe, Jane', 'Roe, Rick'];
      const result = applyTransform({ source: 'AU', field: 'authors', transform: 'identity' }, value);
      expect(result).toEqual(value);
      expect(result).not.toBe(value);
    });

    it('should dispatch on the rule transform', () => {
      expect(
        applyTransform({ source: 'Author Keywords', field: 'keywords', transform: 'split', argument: ';' }, 'a; b')
      ).toEqual(['a', 'b']);
      expect(
        applyTransform({ source: 'AB', field: 'abstract', transform: 'first-n-words', argument: 1 }, 'short abstract')
      ).toBe('short');
      expect(applyTransform({ source: 'PY', field: 'year', transform: 'year-extract' }, 'undated')).toBe('unknown');
    });
  });
});
