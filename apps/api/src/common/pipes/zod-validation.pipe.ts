import { Injectable, Logger, PipeTransform, UnprocessableEntityException } from '@nestjs/common';
import type { ZodType, ZodTypeDef } from 'zod';

/** Parses a request body with a zod schema; the handler receives the schema's output type */
@Injectable()
export class ZodValidationPipe<TOutput> implements PipeTransform<unknown, TOutput> {
  private readonly logger = new Logger(ZodValidationPipe.name);

  constructor(private readonly schema: ZodType<TOutput, ZodTypeDef, unknown>) {}

  transform(value: unknown): TOutput {
    const result = this.schema.safeParse(value);
    if (result.success) return result.data;

    const details = result.error.issues.map((i) => ({
      path: i.path.join('.') || '(root)',
      message: i.message,
    }));
    this.logger.debug(`Request body rejected: ${details.map((d) => `${d.path}: ${d.message}`).join('; ')}`);
    throw new UnprocessableEntityException({
      error: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details,
    });
  }
}
