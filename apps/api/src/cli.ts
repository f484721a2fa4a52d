#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { documentInputSchema, parseDocumentJson } from '@sheetplan/shared';
import { AppModule } from './app.module';
import { parseCliArgs } from './cli-args';
import { describeException } from './common/filters/global-exception.filter';
import { LayoutService } from './modules/layout/layout.service';
import { LayoutProducerService } from './modules/ai/layout-producer.service';
import { XlsxRendererService } from './modules/export/xlsx-renderer.service';

async function run(): Promise<void> {
  const logger = new Logger('CLI');
  const args = parseCliArgs(process.argv.slice(2));

  const raw = parseDocumentJson(await readFile(args.inputPath, 'utf-8'));
  const documents = documentInputSchema.parse(raw);

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  try {
    if (args.producer === 'ai') {
      const layout = await app.get(LayoutProducerService).generate(documents);
      await app.get(XlsxRendererService).renderToFile(layout, args.outputPath);
    } else {
      await app.get(LayoutService).renderDocuments(documents, args.outputPath, {
        sheetNameConflict: args.sheetNameConflict,
      });
    }
    logger.log(`Excel generated successfully: ${args.outputPath}`);
  } finally {
    await app.close();
  }
}

run().catch((err: unknown) => {
  const { body } = describeException(err);
  const details = body.error.details === undefined ? '' : ` ${JSON.stringify(body.error.details)}`;
  new Logger('CLI').error(`[${body.error.code}] ${body.error.message}${details}`);
  process.exit(1);
});
