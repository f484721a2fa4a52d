import { describe, it, expect } from 'vitest';
import {
  columnToLetters,
  lettersToColumn,
  encodeCoordinate,
  decodeCoordinate,
  isDateString,
  deriveTitle,
  sanitizeSheetName,
  toCellValue,
} from '../cell-utils';
import { InvalidCoordinateError } from '../../errors/layout-errors';

describe('columnToLetters', () => {
  it('converts single-letter columns', () => {
    expect(columnToLetters(1)).toBe('A');
    expect(columnToLetters(26)).toBe('Z');
  });

  it('converts double-letter columns', () => {
    expect(columnToLetters(27)).toBe('AA');
    expect(columnToLetters(28)).toBe('AB');
    expect(columnToLetters(52)).toBe('AZ');
    expect(columnToLetters(53)).toBe('BA');
    expect(columnToLetters(702)).toBe('ZZ');
  });

  it('converts triple-letter columns', () => {
    expect(columnToLetters(703)).toBe('AAA');
    expect(columnToLetters(16_384)).toBe('XFD');
  });

  it('rejects non-positive and fractional columns', () => {
    expect(() => columnToLetters(0)).toThrow(InvalidCoordinateError);
    expect(() => columnToLetters(-3)).toThrow(InvalidCoordinateError);
    expect(() => columnToLetters(1.5)).toThrow(InvalidCoordinateError);
  });
});

describe('lettersToColumn', () => {
  it('converts letters', () => {
    expect(lettersToColumn('A')).toBe(1);
    expect(lettersToColumn('Z')).toBe(26);
    expect(lettersToColumn('AA')).toBe(27);
    expect(lettersToColumn('ZZ')).toBe(702);
    expect(lettersToColumn('AAA')).toBe(703);
  });

  it('rejects lowercase and columns past XFD', () => {
    expect(() => lettersToColumn('a')).toThrow(InvalidCoordinateError);
    expect(() => lettersToColumn('XFE')).toThrow(InvalidCoordinateError);
  });
});

describe('encodeCoordinate / decodeCoordinate', () => {
  it('encodes 1-based positions', () => {
    expect(encodeCoordinate(1, 1)).toBe('A1');
    expect(encodeCoordinate(4, 2)).toBe('B4');
    expect(encodeCoordinate(10, 27)).toBe('AA10');
  });

  it('decodes addresses', () => {
    expect(decodeCoordinate('A1')).toEqual({ row: 1, col: 1 });
    expect(decodeCoordinate('B4')).toEqual({ row: 4, col: 2 });
    expect(decodeCoordinate('AAA703')).toEqual({ row: 703, col: 703 });
  });

  it('round-trips every position in a 1000 x 1000 grid', () => {
    for (let row = 1; row <= 1000; row++) {
      for (let col = 1; col <= 1000; col++) {
        const { row: r, col: c } = decodeCoordinate(encodeCoordinate(row, col));
        if (r !== row || c !== col) {
          throw new Error(`round-trip failed at (${row}, ${col})`);
        }
      }
    }
  });

  it('rejects non-positive rows', () => {
    expect(() => encodeCoordinate(0, 1)).toThrow(InvalidCoordinateError);
    expect(() => encodeCoordinate(-1, 1)).toThrow('Invalid coordinate');
  });

  it('rejects malformed addresses', () => {
    expect(() => decodeCoordinate('')).toThrow(InvalidCoordinateError);
    expect(() => decodeCoordinate('1A')).toThrow(InvalidCoordinateError);
    expect(() => decodeCoordinate('a1')).toThrow(InvalidCoordinateError);
    expect(() => decodeCoordinate('A0')).toThrow(InvalidCoordinateError);
    expect(() => decodeCoordinate('A01')).toThrow(InvalidCoordinateError);
    expect(() => decodeCoordinate('ABCD1')).toThrow(InvalidCoordinateError);
  });

  it('carries the offending input in error details', () => {
    try {
      decodeCoordinate('B-2');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCoordinateError);
      if (err instanceof InvalidCoordinateError) {
        expect(err.code).toBe('INVALID_COORDINATE');
        expect(err.details).toEqual({ input: 'B-2' });
      }
    }
  });
});

describe('isDateString', () => {
  it('detects common date shapes', () => {
    expect(isDateString('2024-01-15')).toBe(true);
    expect(isDateString('2024-01-15T10:30:00Z')).toBe(true);
    expect(isDateString('15/01/2024')).toBe(true);
    expect(isDateString('Jan 15, 2024')).toBe(true);
    expect(isDateString('15 Jan 2024')).toBe(true);
  });

  it('rejects numbers and free text', () => {
    expect(isDateString(44000)).toBe(false);
    expect(isDateString('1000')).toBe(false);
    expect(isDateString('Salary credit')).toBe(false);
    expect(isDateString(null)).toBe(false);
  });
});

describe('deriveTitle', () => {
  it('turns a classification key into a title', () => {
    expect(deriveTitle('bank_statement')).toBe('Bank Statement');
    expect(deriveTitle('utility-bill')).toBe('Utility Bill');
  });

  it('leaves existing casing of inner letters alone', () => {
    expect(deriveTitle('KYC form')).toBe('KYC Form');
    expect(deriveTitle('  Bank   Statement ')).toBe('Bank Statement');
  });
});

describe('sanitizeSheetName', () => {
  it('keeps only letters, digits and spaces', () => {
    expect(sanitizeSheetName('Bank Statement')).toBe('Bank Statement');
    expect(sanitizeSheetName('Invoice #42 (copy)')).toBe('Invoice 42 copy');
    expect(sanitizeSheetName('Sheet/1')).toBe('Sheet1');
  });

  it('truncates to 31 chars', () => {
    const long = 'A'.repeat(50);
    expect(sanitizeSheetName(long).length).toBe(31);
  });

  it('returns "Document" for empty input', () => {
    expect(sanitizeSheetName('')).toBe('Document');
    expect(sanitizeSheetName('***')).toBe('Document');
  });
});

describe('toCellValue', () => {
  it('renders null as an empty string', () => {
    expect(toCellValue(null)).toBe('');
  });

  it('keeps strings and numbers unchanged', () => {
    expect(toCellValue('12345')).toBe('12345');
    expect(toCellValue(1000)).toBe(1000);
    expect(toCellValue(0)).toBe(0);
  });

  it('spells out booleans', () => {
    expect(toCellValue(true)).toBe('true');
    expect(toCellValue(false)).toBe('false');
  });
});
