import { z } from 'zod';
import { DATA_TYPES } from '../types/field-types';
import type { Field, SourceDocument } from '../types/field-types';

export const scalarValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const tableRecordSchema = z.record(scalarValueSchema);

export const fieldSchema = z.object({
  field_name: z.string().min(1),
  field_key: z.string(),
  section: z.string().min(1),
  data_type: z.enum(DATA_TYPES),
  value: z.union([scalarValueSchema, z.array(tableRecordSchema)]).default(null),
  columns: z.array(z.string().min(1)).optional(),
}).superRefine((f, ctx) => {
  if (f.data_type === 'Table' && f.value !== null && !Array.isArray(f.value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['value'],
      message: `Table field "${f.field_name}" must hold a list of records or null`,
    });
  }
  if (f.data_type !== 'Table' && Array.isArray(f.value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['value'],
      message: `${f.data_type} field "${f.field_name}" cannot hold a list`,
    });
  }
  if (f.columns && f.data_type !== 'Table') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['columns'],
      message: 'columns may only be declared on Table fields',
    });
  }
}).transform((f): Field => ({
  name: f.field_name,
  key: f.field_key,
  section: f.section,
  dataType: f.data_type,
  value: f.value,
  ...(f.columns ? { columns: f.columns } : {}),
}));

export const documentSchema = z.object({
  file_name: z.string().min(1),
  classified_file_type: z.string().min(1).optional(),
  classified_type: z.string().min(1).optional(),
  fields: z.array(fieldSchema),
}).refine(
  (d) => d.classified_file_type !== undefined || d.classified_type !== undefined,
  { message: 'classified_file_type is required', path: ['classified_file_type'] },
).transform((d): SourceDocument => ({
  fileName: d.file_name,
  classifiedType: d.classified_file_type ?? d.classified_type ?? '',
  fields: d.fields,
}));

/** Accepts `{files: [...]}`, a list of documents, or a single document */
export const documentInputSchema = z.union([
  z.object({ files: z.array(documentSchema).min(1) }).transform((x) => x.files),
  z.array(documentSchema).min(1),
  documentSchema.transform((d) => [d]),
]);
