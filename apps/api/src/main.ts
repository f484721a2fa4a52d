import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { ResponseTransformInterceptor } from './common/interceptors/response-transform.interceptor';
import { registerJsonBodyParser } from './common/utils/json-body-parser';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: false, bodyLimit: 20 * 1024 * 1024 }),
    { bodyParser: false },
  );
  const config = app.get(ConfigService);
  const fastifyInstance = app.getHttpAdapter().getInstance();
  registerJsonBodyParser(fastifyInstance);

  // Global filters and interceptors
  app.useGlobalFilters(new GlobalExceptionFilter());
  app.useGlobalInterceptors(new ResponseTransformInterceptor());

  // Swagger / OpenAPI outside production (requires @fastify/static)
  if (config.get<string>('NODE_ENV') !== 'production') {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('sheetplan API')
      .setDescription('Turns extracted document fields into styled spreadsheet layouts and XLSX workbooks.')
      .setVersion('0.1.0')
      .addTag('layouts', 'Plan, ingest, generate and render layout mappings')
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api/docs', app, document);
  }

  const allowedOrigins = (config.get<string>('FRONTEND_URL') ?? 'http://localhost:3000')
    .split(',')
    .map((o) => o.trim().replace(/\/+$/, ''))
    .filter(Boolean);
  app.enableCors({
    origin: allowedOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  // Health endpoint for container healthchecks
  fastifyInstance.get('/api/health', async () => ({ status: 'ok' }));

  const port = config.get<number>('PORT') ?? 4000;
  await app.listen(port, '0.0.0.0');
  logger.log(`sheetplan API running on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed:', err);
  process.exit(1);
});
