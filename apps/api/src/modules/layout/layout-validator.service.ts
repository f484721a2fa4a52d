import { Injectable } from '@nestjs/common';
import type { LayoutOutput, SheetLayout } from '@sheetplan/shared';
import {
  InvalidCoordinateError,
  InvalidLayoutMappingError,
  SHEET_LIMITS,
  decodeCoordinate,
} from '@sheetplan/shared';

/**
 * Checks a layout mapping against the invariants every producer must honor.
 * Throws on the first violation, naming the invariant and where it broke.
 */
@Injectable()
export class LayoutValidatorService {
  validate(layout: LayoutOutput): void {
    const names = new Map<string, string>();
    for (const sheet of layout) {
      this.validateSheetName(sheet.name, names);
      this.validateCells(sheet);
    }
  }

  private validateSheetName(name: string, seen: Map<string, string>): void {
    if (!/^[A-Za-z0-9 ]+$/.test(name) || name.trim() !== name) {
      throw new InvalidLayoutMappingError(
        'sheet-name',
        `sheet name "${name}" must contain only letters, digits and inner spaces`,
        { sheetName: name },
      );
    }
    if (name.length > SHEET_LIMITS.MAX_SHEET_NAME_LENGTH) {
      throw new InvalidLayoutMappingError(
        'sheet-name',
        `sheet name "${name}" is longer than ${SHEET_LIMITS.MAX_SHEET_NAME_LENGTH} characters`,
        { sheetName: name },
      );
    }
    const previous = seen.get(name.toLowerCase());
    if (previous !== undefined) {
      throw new InvalidLayoutMappingError(
        'unique-sheet-names',
        `sheet "${name}" clashes with sheet "${previous}"`,
        { sheetName: name },
      );
    }
    seen.set(name.toLowerCase(), name);
  }

  private validateCells(sheet: SheetLayout): void {
    if (sheet.cells.length === 0) {
      throw new InvalidLayoutMappingError('non-empty-sheet', `sheet "${sheet.name}" has no cells`, {
        sheetName: sheet.name,
      });
    }

    const coordinates = new Set<string>();
    const rows = new Set<number>();
    let lastRow = 0;

    for (const cell of sheet.cells) {
      const where = { sheetName: sheet.name, coordinate: cell.coordinate };
      let row: number;
      try {
        row = decodeCoordinate(cell.coordinate).row;
      } catch (err) {
        if (err instanceof InvalidCoordinateError) {
          throw new InvalidLayoutMappingError(
            'coordinate-format',
            `"${cell.coordinate}" on sheet "${sheet.name}" is not a cell address`,
            where,
          );
        }
        throw err;
      }

      if (coordinates.has(cell.coordinate)) {
        throw new InvalidLayoutMappingError(
          'unique-coordinates',
          `"${cell.coordinate}" appears more than once on sheet "${sheet.name}"`,
          where,
        );
      }
      coordinates.add(cell.coordinate);

      if (row < lastRow) {
        throw new InvalidLayoutMappingError(
          'monotonic-rows',
          `"${cell.coordinate}" on sheet "${sheet.name}" goes back to row ${row} after row ${lastRow}`,
          where,
        );
      }
      lastRow = row;
      rows.add(row);
    }

    this.validateRowContinuity(sheet.name, [...rows].sort((a, b) => a - b));
  }

  /** Rows start at 1; any gap is a single blank separator row */
  private validateRowContinuity(sheetName: string, rows: number[]): void {
    let previous = 0;
    for (const row of rows) {
      const gap = row - previous - 1;
      if (previous === 0 ? row !== 1 : gap > 1) {
        throw new InvalidLayoutMappingError(
          'contiguous-rows',
          previous === 0
            ? `sheet "${sheetName}" starts at row ${row} instead of row 1`
            : `sheet "${sheetName}" leaves ${gap} empty rows between rows ${previous} and ${row}`,
          { sheetName, row },
        );
      }
      previous = row;
    }
  }
}
