import { Injectable, Logger } from '@nestjs/common';
import type {
  CellRole,
  CellValue,
  DataType,
  LayoutPlan,
  NormalizedDocument,
  PlannedCell,
  PlannedRow,
  PlanRowKind,
  Section,
  TableField,
} from '@sheetplan/shared';
import { deriveTitle, sanitizeSheetName, toCellValue } from '@sheetplan/shared';
import { ColumnDetectorService } from './column-detector.service';

/** Row cursor for one sheet. Every emitted row, blank or not, takes exactly one row number. */
class RowCursor {
  private next = 1;
  readonly rows: PlannedRow[] = [];

  emit(kind: PlanRowKind, cells: PlannedCell[] = []): void {
    this.rows.push({ kind, row: this.next, cells });
    this.next += 1;
  }
}

function cell(column: number, value: CellValue, role: CellRole, dataType: DataType): PlannedCell {
  return { column, value, role, dataType };
}

/**
 * Lays a normalized document out row by row:
 *
 * 1. Title in A1.
 * 2. Each section with scalar fields: a header row, then one label/value row
 *    per field. One blank row between sections, none after the title.
 * 3. Tables after all scalar sections: a blank row, the owning section's
 *    header, the column header row, then one row per record. Consecutive
 *    tables are also separated by a single blank row.
 *
 * A table with no records and no declared columns has nothing to put in its
 * header row, so that row is skipped rather than left as a second gap.
 */
@Injectable()
export class LayoutPlannerService {
  private readonly logger = new Logger(LayoutPlannerService.name);

  constructor(private readonly columnDetector: ColumnDetectorService) {}

  plan(document: NormalizedDocument): LayoutPlan {
    const title = deriveTitle(document.classifiedType);
    const cursor = new RowCursor();

    cursor.emit('title', [cell(1, title, 'title', 'String')]);

    const scalarSections = document.sections.filter((s) => s.scalarFields.length > 0);
    scalarSections.forEach((section, index) => {
      if (index > 0) cursor.emit('blank');
      this.planScalarSection(cursor, section);
    });

    const tables = document.sections.flatMap((section) =>
      section.tableFields.map((field) => ({ section: section.name, field })),
    );
    tables.forEach(({ section, field }, index) => {
      if (index > 0 || scalarSections.length > 0) cursor.emit('blank');
      this.planTable(cursor, section, field);
    });

    return {
      sheetName: sanitizeSheetName(title),
      title,
      rows: cursor.rows,
    };
  }

  private planScalarSection(cursor: RowCursor, section: Section): void {
    cursor.emit('section_header', [cell(1, section.name, 'section_header', 'String')]);
    for (const field of section.scalarFields) {
      cursor.emit('field', [
        cell(1, field.name, 'field_label', field.dataType),
        cell(2, toCellValue(field.value), 'field_value', field.dataType),
      ]);
    }
  }

  private planTable(cursor: RowCursor, sectionName: string, field: TableField): void {
    cursor.emit('section_header', [cell(1, sectionName, 'section_header', 'String')]);

    const columns = this.columnDetector.resolveColumns(field);
    if (columns.length === 0) {
      this.logger.debug(`Table "${field.name}" in section "${sectionName}" has no columns; header row skipped`);
      return;
    }

    const types = columns.map((name) =>
      this.columnDetector.detectType(field.value.map((record) => record[name] ?? null)),
    );
    const typeAt = (index: number): DataType => types[index] ?? 'String';

    cursor.emit(
      'table_header',
      columns.map((name, i) => cell(i + 1, name, 'table_header', typeAt(i))),
    );
    for (const record of field.value) {
      cursor.emit(
        'table_row',
        columns.map((name, i) => cell(i + 1, toCellValue(record[name] ?? null), 'table_cell', typeAt(i))),
      );
    }
  }
}
