import type { DataType } from './field-types';

/** Structural role of a cell; drives style priority */
export const CELL_ROLES = [
  'title',
  'section_header',
  'field_label',
  'table_header',
  'field_value',
  'table_cell',
] as const;
export type CellRole = (typeof CELL_ROLES)[number];

export const BORDER_STYLES = ['thin', 'medium', 'thick', 'none'] as const;
export type BorderStyle = (typeof BORDER_STYLES)[number];

export const HORIZONTAL_ALIGNMENTS = ['left', 'center', 'right'] as const;
export type HorizontalAlignment = (typeof HORIZONTAL_ALIGNMENTS)[number];

export const VERTICAL_ALIGNMENTS = ['top', 'center', 'bottom'] as const;
export type VerticalAlignment = (typeof VERTICAL_ALIGNMENTS)[number];

/** Value written into a cell */
export type CellValue = string | number;

/** Complete style of one cell. Colors are 6-char hex without '#'. */
export interface CellStyle {
  fontSize: number;
  fontColor: string;
  backgroundColor: string | null;
  bold: boolean;
  italic: boolean;
  horizontalAlignment: HorizontalAlignment;
  verticalAlignment: VerticalAlignment;
  borderTop: BorderStyle;
  borderBottom: BorderStyle;
  borderLeft: BorderStyle;
  borderRight: BorderStyle;
  borderColor: string;
}

/** One occupied cell of the layout mapping */
export interface CellMapping {
  coordinate: string;
  value: CellValue;
  style: CellStyle;
}

/** All cells of one sheet, in plan order */
export interface SheetLayout {
  name: string;
  cells: CellMapping[];
}

/** Canonical layout mapping: one entry per sheet, in input order */
export type LayoutOutput = SheetLayout[];

/** Kind of a logical row produced by the planner */
export const PLAN_ROW_KINDS = [
  'title',
  'section_header',
  'field',
  'table_header',
  'table_row',
  'blank',
] as const;
export type PlanRowKind = (typeof PLAN_ROW_KINDS)[number];

/** A cell placed by the planner, before style resolution */
export interface PlannedCell {
  column: number;
  value: CellValue;
  role: CellRole;
  dataType: DataType;
}

export interface PlannedRow {
  kind: PlanRowKind;
  row: number;
  cells: PlannedCell[];
}

/** Planner output for one document */
export interface LayoutPlan {
  sheetName: string;
  title: string;
  rows: PlannedRow[];
}

/** What to do when two documents produce the same sheet name */
export const SHEET_NAME_CONFLICT_POLICIES = ['suffix', 'error'] as const;
export type SheetNameConflictPolicy = (typeof SHEET_NAME_CONFLICT_POLICIES)[number];
