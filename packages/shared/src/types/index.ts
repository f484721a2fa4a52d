export type {
  DataType,
  ScalarDataType,
  ScalarValue,
  TableRecord,
  Field,
  ScalarField,
  TableField,
  SourceDocument,
  Section,
  NormalizedDocument,
} from './field-types';
export { DATA_TYPES } from './field-types';

export type {
  CellRole,
  BorderStyle,
  HorizontalAlignment,
  VerticalAlignment,
  CellValue,
  CellStyle,
  CellMapping,
  SheetLayout,
  LayoutOutput,
  PlanRowKind,
  PlannedCell,
  PlannedRow,
  LayoutPlan,
  SheetNameConflictPolicy,
} from './layout-types';
export {
  CELL_ROLES,
  BORDER_STYLES,
  HORIZONTAL_ALIGNMENTS,
  VERTICAL_ALIGNMENTS,
  PLAN_ROW_KINDS,
  SHEET_NAME_CONFLICT_POLICIES,
} from './layout-types';

export type { ApiResponse, ApiError } from './api-types';
