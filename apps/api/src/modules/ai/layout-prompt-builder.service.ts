import { Injectable } from '@nestjs/common';
import type { CellStyle, SourceDocument } from '@sheetplan/shared';
import { DETECTION_THRESHOLDS, SHEET_LIMITS } from '@sheetplan/shared';
import { LEVEL_STYLES, STYLE_LEVELS, VALUE_ALIGNMENT } from '../layout/style-table';

@Injectable()
export class LayoutPromptBuilderService {
  /**
   * System prompt asking a model to produce the same cell mapping the layout
   * engine would. Style values come from the engine's own style table so the
   * two producers cannot drift apart.
   */
  buildSystemPrompt(): string {
    return `You are a deterministic layout engine that places extracted document data into spreadsheet cells.

You receive a JSON list of documents. Each document has "file_name", "classified_file_type" and
"fields"; each field has "field_name", "field_key", "section", "data_type" (String, Number, Date
or Table) and "value" (null, a scalar, or for Table a list of records).

${this.buildLayoutRules()}

${this.buildStyleRules()}

${this.buildResponseFormat()}`;
  }

  /** Documents in their upstream wire shape */
  buildUserMessage(documents: SourceDocument[]): string {
    const payload = documents.map((doc) => ({
      file_name: doc.fileName,
      classified_file_type: doc.classifiedType,
      fields: doc.fields.map((f) => ({
        field_name: f.name,
        field_key: f.key,
        section: f.section,
        data_type: f.dataType,
        value: f.value,
        ...(f.columns ? { columns: f.columns } : {}),
      })),
    }));
    return `Lay out these documents:\n${JSON.stringify(payload, null, 2)}`;
  }

  private buildLayoutRules(): string {
    return `LAYOUT RULES:
- One sheet per document. Sheet name = the classification as a title ("bank_statement" → "Bank Statement"),
  letters, digits and spaces only, at most ${SHEET_LIMITS.MAX_SHEET_NAME_LENGTH} characters.
- Row 1: the same title in A1.
- Scalar fields (String, Number, Date) grouped by section, in order of first appearance:
  a section header row (section name in column A), then one row per field with the field name in
  column A and the value in column B. No empty row between the title and the first section; exactly
  one empty row between sections.
- Tables after all scalar sections, one empty row before each: the section name in column A, then a
  header row with one column name per cell starting at column A in the original key order, then one
  row per record with each value under its header.
- Use "" for null values. Keep numbers as numbers and dates as their original strings.
- Rows are numbered from 1 with no gaps except those single empty rows. Every cell_coordinate is
  unique within its sheet. Never rename, drop or reorder fields or columns.`;
  }

  private buildStyleRules(): string {
    const levels = STYLE_LEVELS.map((level) =>
      `PRIORITY ${level.priority}: ${level.label.toUpperCase()}\n${this.describeStyle(LEVEL_STYLES[level.priority])}`,
    ).join('\n\n');
    const majority = Math.round(DETECTION_THRESHOLDS.TYPE_MAJORITY_RATIO * 100);

    return `STYLING (apply the same style to every cell of a role; never vary per row):

${levels}

Horizontal alignment of field values and table data cells follows the data type:
Number → "${VALUE_ALIGNMENT.Number}", Date → "${VALUE_ALIGNMENT.Date}", String → "${VALUE_ALIGNMENT.String}".
A table column is Number when more than ${majority}% of its non-empty values are numbers, Date when more
than ${majority}% are date strings, and String otherwise. Headers and labels stay as listed.`;
  }

  private describeStyle(style: CellStyle): string {
    return [
      `  font_size: ${style.fontSize}, font_color: "${style.fontColor}", background_color: ${style.backgroundColor === null ? 'null' : `"${style.backgroundColor}"`}`,
      `  is_bold: ${style.bold}, is_italic: ${style.italic}`,
      `  horizontal_alignment: "${style.horizontalAlignment}", vertical_alignment: "${style.verticalAlignment}"`,
      `  border_top: "${style.borderTop}", border_bottom: "${style.borderBottom}", border_left: "${style.borderLeft}", border_right: "${style.borderRight}", border_color: "${style.borderColor}"`,
    ].join('\n');
  }

  private buildResponseFormat(): string {
    return `RESPONSE FORMAT:
Return ONLY a JSON object mapping each sheet name to a list of cells:
{ "<sheet name>": [ { "cell_coordinate": "A1", "cell_value": "...", "font_size": 12, "font_color": "000000",
  "background_color": "FFD2BF", "is_bold": true, "is_italic": false, "horizontal_alignment": "left",
  "vertical_alignment": "center", "border_top": "medium", "border_bottom": "medium", "border_left": "medium",
  "border_right": "medium", "border_color": "000000" } ] }
- Every cell carries all 12 style attributes plus cell_coordinate and cell_value.
- Colors are 6 hex characters without "#". Borders are "thin", "medium", "thick" or "none".
- List cells top to bottom. Do not invent data that is not in the input.`;
  }
}
