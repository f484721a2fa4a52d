import { Injectable } from '@nestjs/common';
import type { ScalarDataType, ScalarValue, TableField } from '@sheetplan/shared';
import { DETECTION_THRESHOLDS, isDateString } from '@sheetplan/shared';

@Injectable()
export class ColumnDetectorService {
  /**
   * Column order of a table: declared columns first, then every record key
   * not yet seen, in first-seen order across records.
   */
  resolveColumns(field: TableField): string[] {
    const columns: string[] = [];
    const seen = new Set<string>();
    const add = (name: string): void => {
      if (!seen.has(name)) {
        seen.add(name);
        columns.push(name);
      }
    };

    for (const name of field.columns ?? []) add(name);
    for (const record of field.value) {
      for (const name of Object.keys(record)) add(name);
    }
    return columns;
  }

  /** Infer the data type of one table column from its values */
  detectType(values: ScalarValue[]): ScalarDataType {
    const nonEmpty = values.filter((v) => v !== null && v !== '');
    if (nonEmpty.length === 0) return 'String';

    const numericCount = nonEmpty.filter((v) => typeof v === 'number').length;
    const dateCount = nonEmpty.filter((v) => isDateString(v)).length;

    if (numericCount / nonEmpty.length > DETECTION_THRESHOLDS.TYPE_MAJORITY_RATIO) return 'Number';
    if (dateCount / nonEmpty.length > DETECTION_THRESHOLDS.TYPE_MAJORITY_RATIO) return 'Date';
    return 'String';
  }
}
