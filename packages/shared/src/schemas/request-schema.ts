import { z } from 'zod';
import { SHEET_NAME_CONFLICT_POLICIES } from '../types/layout-types';
import { documentInputSchema } from './document-schema';

export const layoutRequestSchema = z.object({
  documents: documentInputSchema,
  sheetNameConflict: z.enum(SHEET_NAME_CONFLICT_POLICIES).default('suffix'),
});

export const generateRequestSchema = z.object({
  documents: documentInputSchema,
});

export const ingestRequestSchema = z.object({
  text: z.string().min(1),
});

export type LayoutRequestInput = z.output<typeof layoutRequestSchema>;
export type GenerateRequestInput = z.output<typeof generateRequestSchema>;
export type IngestRequestInput = z.output<typeof ingestRequestSchema>;
