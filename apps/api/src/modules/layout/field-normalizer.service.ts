import { Injectable, Logger } from '@nestjs/common';
import type {
  Field,
  NormalizedDocument,
  ScalarField,
  Section,
  SourceDocument,
  TableField,
} from '@sheetplan/shared';

/**
 * Groups a document's flat field list into sections and splits each section
 * into scalar and table fields.
 *
 * Sections are keyed by exact name in first-seen order. A name that shows up
 * again after another section has started is merged into its first
 * occurrence and reported in `mergedSections`.
 *
 * Classification follows the value's shape: a list is always a table (so no
 * records are lost under a wrong declared type), a null Table is an empty
 * table, and a scalar on a Table field is kept as a String value.
 */
@Injectable()
export class FieldNormalizerService {
  private readonly logger = new Logger(FieldNormalizerService.name);

  normalize(document: SourceDocument): NormalizedDocument {
    const sections = new Map<string, Section>();
    const merged = new Set<string>();
    let previous: string | null = null;

    for (const field of document.fields) {
      let section = sections.get(field.section);
      if (!section) {
        section = { name: field.section, scalarFields: [], tableFields: [] };
        sections.set(field.section, section);
      } else if (previous !== field.section) {
        merged.add(field.section);
      }
      previous = field.section;

      const table = this.asTableField(field);
      if (table) {
        section.tableFields.push(table);
      } else {
        section.scalarFields.push(this.asScalarField(field));
      }
    }

    if (merged.size > 0) {
      this.logger.debug(
        `"${document.fileName}": merged repeated section(s) ${[...merged].map((s) => `"${s}"`).join(', ')}`,
      );
    }

    return {
      fileName: document.fileName,
      classifiedType: document.classifiedType,
      sections: [...sections.values()],
      mergedSections: [...merged],
    };
  }

  private asTableField(field: Field): TableField | null {
    if (Array.isArray(field.value)) {
      return { ...field, dataType: 'Table', value: field.value };
    }
    if (field.dataType === 'Table' && field.value === null) {
      return { ...field, dataType: 'Table', value: [] };
    }
    return null;
  }

  private asScalarField(field: Field): ScalarField {
    const value = Array.isArray(field.value) ? null : field.value;
    const dataType = field.dataType === 'Table' ? 'String' : field.dataType;
    return { name: field.name, key: field.key, section: field.section, dataType, value };
  }
}
