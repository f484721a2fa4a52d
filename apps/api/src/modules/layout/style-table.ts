import type { CellRole, CellStyle, DataType, HorizontalAlignment } from '@sheetplan/shared';

export type StylePriority = 1 | 2 | 3 | 4 | 5;

/** Priority levels, highest first. Roles on one level share a style. */
export const STYLE_LEVELS: ReadonlyArray<{ priority: StylePriority; label: string; roles: readonly CellRole[] }> = [
  { priority: 1, label: 'Document title', roles: ['title'] },
  { priority: 2, label: 'Section headers', roles: ['section_header'] },
  { priority: 3, label: 'Field labels and table column headers', roles: ['field_label', 'table_header'] },
  { priority: 4, label: 'Field values', roles: ['field_value'] },
  { priority: 5, label: 'Table data cells', roles: ['table_cell'] },
];

const ROLE_PRIORITY: Readonly<Record<CellRole, StylePriority>> = {
  title: 1,
  section_header: 2,
  field_label: 3,
  table_header: 3,
  field_value: 4,
  table_cell: 5,
};

export const LEVEL_STYLES: Readonly<Record<StylePriority, CellStyle>> = {
  1: {
    fontSize: 12,
    fontColor: '000000',
    backgroundColor: 'FFD2BF',
    bold: true,
    italic: false,
    horizontalAlignment: 'left',
    verticalAlignment: 'center',
    borderTop: 'medium',
    borderBottom: 'medium',
    borderLeft: 'medium',
    borderRight: 'medium',
    borderColor: '000000',
  },
  2: {
    fontSize: 11,
    fontColor: '000000',
    backgroundColor: 'B6C2DB',
    bold: true,
    italic: false,
    horizontalAlignment: 'left',
    verticalAlignment: 'center',
    borderTop: 'medium',
    borderBottom: 'medium',
    borderLeft: 'thin',
    borderRight: 'thin',
    borderColor: '000000',
  },
  3: {
    fontSize: 10,
    fontColor: '000000',
    backgroundColor: 'F0EFE8',
    bold: true,
    italic: false,
    horizontalAlignment: 'left',
    verticalAlignment: 'center',
    borderTop: 'thin',
    borderBottom: 'thin',
    borderLeft: 'thin',
    borderRight: 'thin',
    borderColor: '000000',
  },
  4: {
    fontSize: 10,
    fontColor: '000000',
    backgroundColor: null,
    bold: false,
    italic: false,
    horizontalAlignment: 'left',
    verticalAlignment: 'center',
    borderTop: 'thin',
    borderBottom: 'thin',
    borderLeft: 'thin',
    borderRight: 'thin',
    borderColor: 'D3D3D3',
  },
  5: {
    fontSize: 10,
    fontColor: '000000',
    backgroundColor: null,
    bold: false,
    italic: false,
    horizontalAlignment: 'left',
    verticalAlignment: 'center',
    borderTop: 'thin',
    borderBottom: 'thin',
    borderLeft: 'thin',
    borderRight: 'thin',
    borderColor: 'D3D3D3',
  },
};

/** Roles whose horizontal alignment follows the data type */
const TYPE_ALIGNED_ROLES: ReadonlySet<CellRole> = new Set<CellRole>(['field_value', 'table_cell']);

export const VALUE_ALIGNMENT: Readonly<Record<DataType, HorizontalAlignment>> = {
  String: 'left',
  Number: 'right',
  Date: 'center',
  Table: 'left',
};

function buildStyle(role: CellRole, dataType: DataType): Readonly<CellStyle> {
  const base = LEVEL_STYLES[ROLE_PRIORITY[role]];
  const horizontalAlignment = TYPE_ALIGNED_ROLES.has(role)
    ? VALUE_ALIGNMENT[dataType]
    : base.horizontalAlignment;
  return Object.freeze({ ...base, horizontalAlignment });
}

function buildRoleStyles(role: CellRole): Readonly<Record<DataType, Readonly<CellStyle>>> {
  return Object.freeze({
    String: buildStyle(role, 'String'),
    Number: buildStyle(role, 'Number'),
    Date: buildStyle(role, 'Date'),
    Table: buildStyle(role, 'Table'),
  });
}

/**
 * role × data type → style, built once at load. Lookups return the same
 * frozen object every time.
 */
export const STYLE_TABLE: Readonly<Record<CellRole, Readonly<Record<DataType, Readonly<CellStyle>>>>> =
  Object.freeze({
    title: buildRoleStyles('title'),
    section_header: buildRoleStyles('section_header'),
    field_label: buildRoleStyles('field_label'),
    table_header: buildRoleStyles('table_header'),
    field_value: buildRoleStyles('field_value'),
    table_cell: buildRoleStyles('table_cell'),
  });
