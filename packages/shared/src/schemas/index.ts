export {
  scalarValueSchema,
  tableRecordSchema,
  fieldSchema,
  documentSchema,
  documentInputSchema,
} from './document-schema';

export {
  wireCellMappingSchema,
  wireLayoutSchema,
  type WireCellMapping,
  type WireLayout,
  type WireSheet,
} from './layout-schema';

export {
  layoutRequestSchema,
  generateRequestSchema,
  ingestRequestSchema,
  type LayoutRequestInput,
  type GenerateRequestInput,
  type IngestRequestInput,
} from './request-schema';
