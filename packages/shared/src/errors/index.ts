export {
  LAYOUT_ERROR_CODES,
  LayoutError,
  InvalidCoordinateError,
  InvalidInputError,
  EmptyDocumentError,
  AmbiguousSheetNameError,
  NoJsonObjectFoundError,
  MalformedJsonError,
  InvalidLayoutMappingError,
  BadCoordinateError,
  EmptyLayoutError,
  type LayoutErrorCode,
} from './layout-errors';
