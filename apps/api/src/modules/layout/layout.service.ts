import { Injectable, Logger } from '@nestjs/common';
import type { LayoutOutput, SourceDocument } from '@sheetplan/shared';
import { MappingAssemblerService, type AssembleOptions } from './mapping-assembler.service';
import { MappingIngestorService } from './mapping-ingestor.service';
import { XlsxRendererService } from '../export/xlsx-renderer.service';

/**
 * Entry points shared by the HTTP controller and the CLI.
 * Inputs and destinations always arrive as arguments.
 */
@Injectable()
export class LayoutService {
  private readonly logger = new Logger(LayoutService.name);

  constructor(
    private readonly assembler: MappingAssemblerService,
    private readonly ingestor: MappingIngestorService,
    private readonly renderer: XlsxRendererService,
  ) {}

  buildLayout(documents: SourceDocument[], options: AssembleOptions = {}): LayoutOutput {
    const layout = this.assembler.assemble(documents, options);
    this.logger.log(
      `Layout built for ${documents.length} document(s): ${layout.map((s) => `"${s.name}"`).join(', ')}`,
    );
    return layout;
  }

  ingest(raw: string): LayoutOutput {
    return this.ingestor.ingest(raw);
  }

  renderToBuffer(layout: LayoutOutput): Promise<Buffer> {
    return this.renderer.renderToBuffer(layout);
  }

  async renderDocuments(
    documents: SourceDocument[],
    outputPath: string,
    options: AssembleOptions = {},
  ): Promise<LayoutOutput> {
    const layout = this.buildLayout(documents, options);
    await this.renderer.renderToFile(layout, outputPath);
    return layout;
  }

  async renderProducerText(raw: string, outputPath: string): Promise<LayoutOutput> {
    const layout = this.ingest(raw);
    await this.renderer.renderToFile(layout, outputPath);
    return layout;
  }
}
