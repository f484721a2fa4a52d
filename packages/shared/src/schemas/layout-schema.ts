import { z } from 'zod';
import {
  BORDER_STYLES,
  HORIZONTAL_ALIGNMENTS,
  VERTICAL_ALIGNMENTS,
} from '../types/layout-types';

const hexColorSchema = z.string().regex(/^[0-9a-fA-F]{6}$/, 'Expected a 6-character hex color without "#"');

const borderSchema = z.enum(BORDER_STYLES);

/** One cell as exchanged with external producers (snake_case, all 12 style attributes) */
export const wireCellMappingSchema = z.object({
  cell_coordinate: z.string().min(1),
  cell_value: z.union([z.string(), z.number()]).nullable().transform((v) => v ?? ''),
  font_size: z.number().int().min(6).max(72),
  font_color: hexColorSchema,
  background_color: hexColorSchema.nullable(),
  is_bold: z.boolean(),
  is_italic: z.boolean(),
  horizontal_alignment: z.enum(HORIZONTAL_ALIGNMENTS),
  vertical_alignment: z.enum(VERTICAL_ALIGNMENTS),
  border_top: borderSchema,
  border_bottom: borderSchema,
  border_left: borderSchema,
  border_right: borderSchema,
  border_color: hexColorSchema,
});

/** `{sheetName: [cell, ...]}` */
export const wireLayoutSchema = z.record(z.array(wireCellMappingSchema));

export type WireCellMapping = z.output<typeof wireCellMappingSchema>;
export type WireLayout = z.output<typeof wireLayoutSchema>;

/** One sheet of a planned layout as returned over HTTP */
export interface WireSheet {
  sheet_name: string;
  cells: WireCellMapping[];
}
