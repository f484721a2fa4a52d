import type { FastifyInstance } from 'fastify';
import { parseDocumentJson } from '@sheetplan/shared';

/**
 * Replace Fastify's JSON body parser with one that reads the text itself, so
 * table columns keep the order they were written in. Parse failures reach the
 * error handler as InvalidInputError.
 */
export function registerJsonBodyParser(fastify: FastifyInstance): void {
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser<string>('application/json', { parseAs: 'string' }, (_request, body, done) => {
    try {
      done(null, parseDocumentJson(body));
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)));
    }
  });
}
