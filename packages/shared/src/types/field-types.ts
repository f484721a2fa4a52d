/** Declared type of an extracted field */
export const DATA_TYPES = ['String', 'Number', 'Date', 'Table'] as const;
export type DataType = (typeof DATA_TYPES)[number];

/** Scalar data types (everything except Table) */
export type ScalarDataType = Exclude<DataType, 'Table'>;

/** Primitive value carried by a scalar field or a table record column */
export type ScalarValue = string | number | boolean | null;

/** One table row: column name → value. Key order is the column order. */
export type TableRecord = Record<string, ScalarValue>;

/** A single extracted field, as produced by upstream extraction */
export interface Field {
  name: string;
  key: string;
  section: string;
  dataType: DataType;
  value: ScalarValue | TableRecord[];
  /** Declared column order for Table fields (lets an empty table keep its header) */
  columns?: string[];
}

/** A scalar field after classification */
export interface ScalarField extends Field {
  dataType: ScalarDataType;
  value: ScalarValue;
}

/** A table field after classification; null values become an empty record list */
export interface TableField extends Field {
  dataType: 'Table';
  value: TableRecord[];
}

/** One extracted document: a flat list of fields plus its classification */
export interface SourceDocument {
  fileName: string;
  classifiedType: string;
  fields: Field[];
}

/** Fields grouped under one section name, split by kind */
export interface Section {
  name: string;
  scalarFields: ScalarField[];
  tableFields: TableField[];
}

/** Result of grouping a document's fields into sections */
export interface NormalizedDocument {
  fileName: string;
  classifiedType: string;
  sections: Section[];
  /** Section names that re-appeared non-contiguously and were folded into their first occurrence */
  mergedSections: string[];
}
