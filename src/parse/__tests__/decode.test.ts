import { describe, it, expect } from 'vitest';
import { ConversionError } from '../../convert/errors.js';
import { decodeInput, encodeOutput, isRepresentable } from '../decode.js';

describe('decode', () => {
  it('should drop a UTF-8 byte-order mark', () => {
    const buffer = Buffer.from('\uFEFFTitle,Year\n', 'utf8');
    expect(decodeInput(buffer)).toBe('Title,Year\n');
  });

  it('should decode a declared legacy encoding', () => {
    const buffer = Buffer.from([0x4d, 0xfc, 0x6c, 0x6c, 0x65, 0x72]);
    expect(decodeInput(buffer, 'latin1')).toBe('Müller');
  });

  it('should reject an unknown encoding', () => {
    expect(() => decodeInput(Buffer.from('x'), 'klingon-8')).toThrow(ConversionError);
    expect(() => encodeOutput('x', 'klingon-8')).toThrow('Unsupported character encoding: klingon-8');
  });

  it('should tell whether text fits the target encoding', () => {
    expect(isRepresentable('Muller', 'ascii')).toBe(true);
    expect(isRepresentable('Müller', 'ascii')).toBe(false);
    expect(isRepresentable('Müller', 'latin1')).toBe(true);
    expect(isRepresentable('Müller')).toBe(true);
  });
});
