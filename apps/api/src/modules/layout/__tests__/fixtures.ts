import { toWireCell } from '@sheetplan/shared';
import type { DataType, Field, LayoutOutput, SourceDocument, TableRecord, ScalarValue } from '@sheetplan/shared';
import { ColumnDetectorService } from '../column-detector.service';
import { FieldNormalizerService } from '../field-normalizer.service';
import { LayoutPlannerService } from '../layout-planner.service';
import { LayoutValidatorService } from '../layout-validator.service';
import { MappingAssemblerService } from '../mapping-assembler.service';
import { MappingIngestorService } from '../mapping-ingestor.service';
import { StyleResolverService } from '../style-resolver.service';

export function field(
  name: string,
  section: string,
  dataType: DataType,
  value: ScalarValue | TableRecord[],
): Field {
  return {
    name,
    key: name.toLowerCase().replace(/\s+/g, '_'),
    section,
    dataType,
    value,
  };
}

/** The two-field account example: one section, no tables */
export function accountDocument(): SourceDocument {
  return {
    fileName: 'statement-jan.pdf',
    classifiedType: 'bank_statement',
    fields: [
      field('Account Number', 'Account Information', 'String', '12345'),
      field('Balance', 'Account Information', 'Number', 1000),
    ],
  };
}

export const transactions: TableRecord[] = [
  { Date: '2024-01-02', Description: 'Opening deposit', Amount: 500 },
  { Date: '2024-01-09', Description: 'Card payment', Amount: -45.5 },
];

/** Two scalar sections followed by a transaction table */
export function statementDocument(): SourceDocument {
  return {
    fileName: 'statement-feb.pdf',
    classifiedType: 'bank_statement',
    fields: [
      field('Account Number', 'Account Information', 'String', '12345'),
      field('Balance', 'Account Information', 'Number', 1000),
      field('Name', 'Customer Details', 'String', 'Jane Doe'),
      field('Opened', 'Customer Details', 'Date', '2020-05-01'),
      field('Transaction History', 'Transaction History', 'Table', transactions),
    ],
  };
}

export function createEngine() {
  const normalizer = new FieldNormalizerService();
  const detector = new ColumnDetectorService();
  const planner = new LayoutPlannerService(detector);
  const resolver = new StyleResolverService();
  const assembler = new MappingAssemblerService(normalizer, planner, resolver);
  const validator = new LayoutValidatorService();
  const ingestor = new MappingIngestorService(validator);
  return { normalizer, detector, planner, resolver, assembler, validator, ingestor };
}

/** Producer-style text for a layout, sheets written in layout order */
export function producerText(layout: LayoutOutput): string {
  const sheets = layout.map((sheet) => `${JSON.stringify(sheet.name)}: ${JSON.stringify(sheet.cells.map(toWireCell))}`);
  return `{${sheets.join(', ')}}`;
}
