import { DxfError, DxfErrorCode, MalformedValueError } from '../../errors/types';
import {
  fitsWireType,
  formatDouble,
  formatGroupCode,
  formatHandle,
  formatValue,
  parseDouble,
  parseHandle,
  parseInteger,
  wireTypeOf
} from '../group-codes';

describe('group codes', () => {
  describe('wireTypeOf', () => {
    it('should map the fixed code ranges to wire types', () => {
      expect(wireTypeOf(0)).toBe('string');
      expect(wireTypeOf(8)).toBe('string');
      expect(wireTypeOf(10)).toBe('double');
      expect(wireTypeOf(40)).toBe('double');
      expect(wireTypeOf(62)).toBe('int16');
      expect(wireTypeOf(90)).toBe('int32');
      expect(wireTypeOf(100)).toBe('string');
      expect(wireTypeOf(160)).toBe('int64');
      expect(wireTypeOf(290)).toBe('boolean');
      expect(wireTypeOf(370)).toBe('int16');
      expect(wireTypeOf(420)).toBe('int32');
      expect(wireTypeOf(430)).toBe('string');
      expect(wireTypeOf(440)).toBe('int32');
      expect(wireTypeOf(999)).toBe('string');
      expect(wireTypeOf(1000)).toBe('string');
    });

    it('should treat handles and binary chunks separately from strings', () => {
      expect(wireTypeOf(5)).toBe('handle');
      expect(wireTypeOf(330)).toBe('handle');
      expect(wireTypeOf(360)).toBe('handle');
      expect(wireTypeOf(390)).toBe('handle');
      expect(wireTypeOf(1005)).toBe('handle');
      expect(wireTypeOf(310)).toBe('binary');
      expect(wireTypeOf(1004)).toBe('binary');
    });

    it('should report codes outside every range as unknown', () => {
      expect(wireTypeOf(2000)).toBe('unknown');
      expect(wireTypeOf(-5)).toBe('unknown');
    });
  });

  describe('fitsWireType', () => {
    it('should check integer widths', () => {
      expect(fitsWireType(62, 256)).toBe(true);
      expect(fitsWireType(62, 40000)).toBe(false);
      expect(fitsWireType(90, 40000)).toBe(true);
      expect(fitsWireType(290, 1)).toBe(true);
      expect(fitsWireType(290, 2)).toBe(false);
    });
  });

  describe('parsing', () => {
    it('should parse doubles in fixed and exponent notation', () => {
      expect(parseDouble('5.0')).toBe(5);
      expect(parseDouble(' 2.5 ')).toBe(2.5);
      expect(parseDouble('1.5e3')).toBe(1500);
      expect(parseDouble('-.25')).toBe(-0.25);
    });

    it('should reject values that are not decimal numbers', () => {
      expect(() => parseDouble('abc')).toThrow(MalformedValueError);
      expect(() => parseDouble('0x10')).toThrow(MalformedValueError);
      expect(() => parseDouble('')).toThrow(MalformedValueError);
      expect(() => parseInteger('12.5')).toThrow(MalformedValueError);
    });

    it('should parse integers and hexadecimal handles', () => {
      expect(parseInteger('-7')).toBe(-7);
      expect(parseInteger('  42')).toBe(42);
      expect(parseHandle('1A')).toBe(26);
      expect(parseHandle('1a')).toBe(26);
      expect(() => parseHandle('XYZ')).toThrow(MalformedValueError);
    });

    it('should refuse handles wider than 53 bits', () => {
      expect(parseHandle('1FFFFFFFFFFFFF')).toBe(9007199254740991);
      expect(() => parseHandle('20000000000000')).toThrow(MalformedValueError);
      let caught: unknown;
      try {
        parseHandle('FFFFFFFFFFFFFFFF', { groupCode: 5 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MalformedValueError);
      if (caught instanceof MalformedValueError) {
        expect(caught.rawValue).toBe('FFFFFFFFFFFFFFFF');
        expect(caught.message).toBe('Handle "FFFFFFFFFFFFFFFF" does not fit in 53 bits');
      }
    });

    it('should keep the raw value on malformed errors', () => {
      let caught: unknown;
      try {
        parseDouble('bad', { lineNumber: 4 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MalformedValueError);
      if (caught instanceof MalformedValueError) {
        expect(caught.rawValue).toBe('bad');
        expect(caught.details?.lineNumber).toBe(4);
        expect(caught.code).toBe(DxfErrorCode.MALFORMED_VALUE);
      }
    });
  });

  describe('formatting', () => {
    it('should right-justify group codes to width 3', () => {
      expect(formatGroupCode(0)).toBe('  0');
      expect(formatGroupCode(10)).toBe(' 10');
      expect(formatGroupCode(100)).toBe('100');
      expect(formatGroupCode(1000)).toBe('1000');
    });

    it('should write doubles with six fraction digits and no exponent', () => {
      expect(formatDouble(5)).toBe('5.000000');
      expect(formatDouble(-0.5)).toBe('-0.500000');
      expect(formatDouble(0.1)).toBe('0.100000');
      expect(formatDouble(1e21)).toBe('1000000000000000000000.000000');
    });

    it('should refuse non-finite doubles', () => {
      expect(() => formatDouble(NaN)).toThrow(MalformedValueError);
      expect(() => formatDouble(Infinity)).toThrow(MalformedValueError);
    });

    it('should write handles as uppercase hexadecimal without prefix', () => {
      expect(formatHandle(26)).toBe('1A');
      expect(formatHandle(255)).toBe('FF');
      expect(formatValue(26, 'handle')).toBe('1A');
      expect(() => formatValue(2 ** 53, 'handle')).toThrow(MalformedValueError);
    });

    it('should check values against their declared type', () => {
      expect(formatValue('WALLS', 'string')).toBe('WALLS');
      expect(formatValue(7, 'integer')).toBe('7');
      expect(() => formatValue(1.5, 'integer')).toThrow(MalformedValueError);
      expect(() => formatValue('x', 'double')).toThrow(DxfError);
      let caught: unknown;
      try {
        formatValue(undefined, 'string');
      } catch (error) {
        caught = error;
      }
      expect(caught instanceof DxfError && caught.code).toBe(DxfErrorCode.FIELD_TYPE);
    });
  });
});
