import { SHEET_LIMITS } from '../constants/limits';
import { InvalidCoordinateError } from '../errors/layout-errors';
import type { ScalarValue } from '../types/field-types';
import type { CellValue } from '../types/layout-types';

/**
 * Convert a 1-based column number to Excel letter(s): 1→A, 26→Z, 27→AA, 703→AAA
 */
export function columnToLetters(col: number): string {
  if (!Number.isInteger(col) || col < 1 || col > SHEET_LIMITS.MAX_COLS) {
    throw new InvalidCoordinateError(`column must be an integer in 1..${SHEET_LIMITS.MAX_COLS}`, col);
  }
  let result = '';
  let n = col;
  while (n > 0) {
    const rem = (n - 1) % 26;
    result = String.fromCharCode(rem + 65) + result;
    n = Math.floor((n - 1) / 26);
  }
  return result;
}

/**
 * Convert Excel column letter(s) to a 1-based column number: A→1, Z→26, AA→27
 */
export function lettersToColumn(letters: string): number {
  if (!/^[A-Z]{1,3}$/.test(letters)) {
    throw new InvalidCoordinateError('column letters must be 1-3 uppercase A-Z characters', letters);
  }
  let result = 0;
  for (let i = 0; i < letters.length; i++) {
    result = result * 26 + (letters.charCodeAt(i) - 64);
  }
  if (result > SHEET_LIMITS.MAX_COLS) {
    throw new InvalidCoordinateError(`column exceeds ${SHEET_LIMITS.MAX_COLS}`, letters);
  }
  return result;
}

/**
 * Build an address from 1-based row/column: (1, 1) → "A1", (4, 2) → "B4"
 */
export function encodeCoordinate(row: number, col: number): string {
  if (!Number.isInteger(row) || row < 1 || row > SHEET_LIMITS.MAX_ROWS) {
    throw new InvalidCoordinateError(`row must be an integer in 1..${SHEET_LIMITS.MAX_ROWS}`, { row, col });
  }
  return `${columnToLetters(col)}${row}`;
}

/**
 * Parse an address like "B4" into 1-based { row: 4, col: 2 }
 */
export function decodeCoordinate(address: string): { row: number; col: number } {
  const match = /^([A-Z]{1,3})([1-9]\d{0,6})$/.exec(address);
  if (!match?.[1] || !match[2]) {
    throw new InvalidCoordinateError('expected column letters followed by a row number', address);
  }
  const row = parseInt(match[2], 10);
  if (row > SHEET_LIMITS.MAX_ROWS) {
    throw new InvalidCoordinateError(`row exceeds ${SHEET_LIMITS.MAX_ROWS}`, address);
  }
  return { row, col: lettersToColumn(match[1]) };
}

const DATE_PATTERNS: RegExp[] = [
  // 2024-01-15, 2024-01-15T10:30:00Z
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/,
  // 15/01/2024, 01-15-24, 15.01.2024
  /^\d{1,2}[/.-]\d{1,2}[/.-](?:\d{2}|\d{4})$/,
  // 2024/01/15
  /^\d{4}\/\d{1,2}\/\d{1,2}$/,
  // Jan 15, 2024 / January 15 2024
  /^[A-Za-z]{3,9}\.? \d{1,2},? \d{4}$/,
  // 15 Jan 2024 / 15-Jan-2024
  /^\d{1,2}[ -][A-Za-z]{3,9}\.?[ ,-]*\d{2,4}$/,
];

/**
 * Check if a value is a date-shaped string. Plain numbers never count:
 * Date.parse accepts bare years ("1000") which would misclassify amounts.
 */
export function isDateString(value: unknown): boolean {
  if (typeof value !== 'string') return false;
  const trimmed = value.trim();
  return DATE_PATTERNS.some((p) => p.test(trimmed));
}

/**
 * Human title from a classification: "bank_statement" → "Bank Statement".
 * Only the first letter of each word is touched.
 */
export function deriveTitle(classifiedType: string): string {
  return classifiedType
    .replace(/[_-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .split(' ')
    .map((w) => (w ? w.charAt(0).toUpperCase() + w.slice(1) : w))
    .join(' ');
}

/**
 * Sanitize sheet name: keep letters, digits and spaces, limit length
 */
export function sanitizeSheetName(name: string): string {
  return name
    .replace(/[^A-Za-z0-9 ]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, SHEET_LIMITS.MAX_SHEET_NAME_LENGTH)
    .trim() || 'Document';
}

/**
 * Value written to a cell: null → "", booleans spelled out, everything else as-is
 */
export function toCellValue(value: ScalarValue): CellValue {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}
