export const LAYOUT_ERROR_CODES = [
  'INVALID_COORDINATE',
  'INVALID_INPUT',
  'EMPTY_DOCUMENT',
  'AMBIGUOUS_SHEET_NAME',
  'NO_JSON_OBJECT_FOUND',
  'MALFORMED_JSON',
  'INVALID_LAYOUT_MAPPING',
  'BAD_COORDINATE',
  'EMPTY_LAYOUT',
] as const;
export type LayoutErrorCode = (typeof LAYOUT_ERROR_CODES)[number];

/**
 * Base class for every terminal failure of the layout pipeline.
 * `details` names the coordinate, sheet, section or input fragment involved.
 */
export abstract class LayoutError extends Error {
  abstract readonly code: LayoutErrorCode;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCoordinateError extends LayoutError {
  readonly code = 'INVALID_COORDINATE';

  constructor(reason: string, input: string | number | { row: number; col: number }) {
    super(`Invalid coordinate ${JSON.stringify(input)}: ${reason}`, { input });
  }
}

/** Upstream document text that is not JSON */
export class InvalidInputError extends LayoutError {
  readonly code = 'INVALID_INPUT';

  constructor(reason: string, offset: number) {
    super(`Input is not valid JSON: ${reason} at offset ${offset}`, { reason, offset });
  }
}

export class EmptyDocumentError extends LayoutError {
  readonly code = 'EMPTY_DOCUMENT';

  constructor(fileName: string) {
    super(`Document "${fileName}" has no fields to lay out`, { fileName });
  }
}

export class AmbiguousSheetNameError extends LayoutError {
  readonly code = 'AMBIGUOUS_SHEET_NAME';

  constructor(sheetName: string, firstFile: string, secondFile: string) {
    super(
      `Documents "${firstFile}" and "${secondFile}" both map to sheet "${sheetName}"`,
      { sheetName, files: [firstFile, secondFile] },
    );
  }
}

export class NoJsonObjectFoundError extends LayoutError {
  readonly code = 'NO_JSON_OBJECT_FOUND';

  constructor(reason: string, fragment: string) {
    super(`No JSON object found in producer output: ${reason}`, { fragment });
  }
}

export class MalformedJsonError extends LayoutError {
  readonly code = 'MALFORMED_JSON';

  constructor(parserMessage: string, fragment: string) {
    super(`Producer output is not valid JSON: ${parserMessage}`, { fragment });
  }
}

export class InvalidLayoutMappingError extends LayoutError {
  readonly code = 'INVALID_LAYOUT_MAPPING';

  constructor(
    readonly invariant: string,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(`Invalid layout mapping (${invariant}): ${message}`, { invariant, ...details });
  }
}

export class BadCoordinateError extends LayoutError {
  readonly code = 'BAD_COORDINATE';

  constructor(sheetName: string, coordinate: string) {
    super(`Cannot place cell "${coordinate}" on sheet "${sheetName}"`, { sheetName, coordinate });
  }
}

export class EmptyLayoutError extends LayoutError {
  readonly code = 'EMPTY_LAYOUT';

  constructor() {
    super('Layout mapping contains no sheets');
  }
}
