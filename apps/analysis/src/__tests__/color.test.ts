import { describe, it, expect } from '@jest/globals';
import { parseHexColor } from '../services/decoder/color.js';
import { failureOf, valueOf } from './helpers/errors.js';

describe('parseHexColor', () => {
  it('maps each channel byte onto [0, 1]', () => {
    expect(valueOf(parseHexColor('#1A2B3C'))).toEqual({ r: 26 / 255, g: 43 / 255, b: 60 / 255, a: 1 });
  });

  it('accepts lower-case digits', () => {
    expect(valueOf(parseHexColor('#ff0000'))).toEqual({ r: 1, g: 0, b: 0, a: 1 });
  });

  it('rejects a value without the leading hash', () => {
    const error = failureOf(parseHexColor('1A2B3C'));
    expect(error.kind).toBe('wrong-prefix');
    expect(error.message).toBe("color '1A2B3C' does not start with '#'");
  });

  it('rejects non-hex digits', () => {
    expect(failureOf(parseHexColor('#GGHHII')).kind).toBe('parse');
  });

  it('rejects the wrong number of digits', () => {
    expect(failureOf(parseHexColor('#12345')).kind).toBe('parse');
    expect(failureOf(parseHexColor('#1234567')).kind).toBe('parse');
  });
});
