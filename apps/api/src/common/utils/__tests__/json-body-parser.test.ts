import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { documentInputSchema } from '@sheetplan/shared';
import { describeException } from '../../filters/global-exception.filter';
import { registerJsonBodyParser } from '../json-body-parser';

const tableDocument =
  '{"file_name": "pl.pdf", "classified_file_type": "income_statement", "fields": [' +
  '{"field_name": "Lines", "field_key": "lines", "section": "Results", "data_type": "Table",' +
  ' "value": [{"Item": "Revenue", "2023": 100, "2024": 120}]}]}';

describe('registerJsonBodyParser', () => {
  let fastify: FastifyInstance;
  let received: unknown;

  beforeEach(() => {
    received = undefined;
    fastify = Fastify({ logger: false });
    registerJsonBodyParser(fastify);
    fastify.setErrorHandler((err, _request, reply) => {
      const { status, body } = describeException(err);
      void reply.status(status).send(body);
    });
    fastify.post('/documents', async (request) => {
      received = request.body;
      return { ok: true };
    });
  });

  afterEach(async () => {
    await fastify.close();
  });

  it('hands the route a body whose table columns follow the request text', async () => {
    const res = await fastify.inject({
      method: 'POST',
      url: '/documents',
      headers: { 'content-type': 'application/json' },
      payload: tableDocument,
    });

    expect(res.statusCode).toBe(200);
    const [document] = documentInputSchema.parse(received);
    expect(document?.fields[0]?.columns).toEqual(['Item', '2023', '2024']);
  });

  it('answers 400 INVALID_INPUT for a body that is not JSON', async () => {
    const res = await fastify.inject({
      method: 'POST',
      url: '/documents',
      headers: { 'content-type': 'application/json' },
      payload: '{"file_name": }',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ success: false, error: { code: 'INVALID_INPUT' } });
    expect(received).toBeUndefined();
  });
});
