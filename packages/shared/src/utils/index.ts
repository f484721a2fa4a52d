export {
  columnToLetters,
  lettersToColumn,
  encodeCoordinate,
  decodeCoordinate,
  isDateString,
  deriveTitle,
  sanitizeSheetName,
  toCellValue,
} from './cell-utils';

export { toWireCell, fromWireCell, toWirePlan, fromWireLayout } from './mapping-utils';

export {
  parseJsonTree,
  propertyNames,
  nodeToValue,
  parseDocumentJson,
  type JsonTreeResult,
} from './ordered-json';
