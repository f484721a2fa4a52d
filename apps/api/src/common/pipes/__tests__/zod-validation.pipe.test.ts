import { describe, it, expect } from 'vitest';
import { UnprocessableEntityException } from '@nestjs/common';
import { layoutRequestSchema } from '@sheetplan/shared';
import { ZodValidationPipe } from '../zod-validation.pipe';

const pipe = new ZodValidationPipe(layoutRequestSchema);

const upstream = {
  file_name: 'statement.pdf',
  classified_file_type: 'bank_statement',
  fields: [
    { field_name: 'Balance', field_key: 'balance', section: 'Account', data_type: 'Number', value: 1000 },
  ],
};

describe('ZodValidationPipe', () => {
  it('returns the transformed body', () => {
    expect(pipe.transform({ documents: upstream })).toEqual({
      documents: [
        {
          fileName: 'statement.pdf',
          classifiedType: 'bank_statement',
          fields: [{ name: 'Balance', key: 'balance', section: 'Account', dataType: 'Number', value: 1000 }],
        },
      ],
      sheetNameConflict: 'suffix',
    });
  });

  it('rejects an invalid body with 422 and the failing paths', () => {
    try {
      pipe.transform({ documents: upstream, sheetNameConflict: 'rename' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnprocessableEntityException);
      if (err instanceof UnprocessableEntityException) {
        expect(err.getStatus()).toBe(422);
        expect(err.getResponse()).toMatchObject({
          error: 'VALIDATION_ERROR',
          details: [expect.objectContaining({ path: 'sheetNameConflict' })],
        });
      }
    }
  });
});
