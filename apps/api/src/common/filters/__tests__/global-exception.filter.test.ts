import { describe, it, expect } from 'vitest';
import { ServiceUnavailableException } from '@nestjs/common';
import { z } from 'zod';
import {
  BadCoordinateError,
  EmptyDocumentError,
  InvalidInputError,
  MalformedJsonError,
  NoJsonObjectFoundError,
} from '@sheetplan/shared';
import { describeException } from '../global-exception.filter';

describe('describeException', () => {
  it('maps unreadable producer text to 400', () => {
    expect(describeException(new NoJsonObjectFoundError('no enclosing braces', 'hello')).status).toBe(400);
    expect(describeException(new MalformedJsonError('Unexpected token', '{,}')).status).toBe(400);
  });

  it('maps a request body that is not JSON to 400', () => {
    const { status, body } = describeException(new InvalidInputError('ValueExpected', 14));
    expect(status).toBe(400);
    expect(body.error.code).toBe('INVALID_INPUT');
    expect(body.error.details).toEqual({ reason: 'ValueExpected', offset: 14 });
  });

  it('maps other layout errors to 422 with code and details', () => {
    expect(describeException(new BadCoordinateError('Sheet', 'A0'))).toEqual({
      status: 422,
      body: {
        success: false,
        error: {
          code: 'BAD_COORDINATE',
          message: 'Cannot place cell "A0" on sheet "Sheet"',
          details: { sheetName: 'Sheet', coordinate: 'A0' },
        },
      },
    });
    expect(describeException(new EmptyDocumentError('blank.pdf')).body.error.code).toBe('EMPTY_DOCUMENT');
  });

  it('keeps the status and error code of HTTP exceptions', () => {
    const { status, body } = describeException(
      new ServiceUnavailableException({ error: 'AI_UNAVAILABLE', message: 'not configured' }),
    );
    expect(status).toBe(503);
    expect(body.error).toEqual({ code: 'AI_UNAVAILABLE', message: 'not configured', details: undefined });
  });

  it('maps validation errors to 422 with their paths', () => {
    const result = z.object({ text: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;
    const { status, body } = describeException(result.error);
    expect(status).toBe(422);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details).toEqual([{ path: 'text', message: 'Required' }]);
  });

  it('maps anything else to 500', () => {
    expect(describeException(new Error('boom'))).toEqual({
      status: 500,
      body: { success: false, error: { code: 'INTERNAL_ERROR', message: 'boom', details: undefined } },
    });
  });
});
