import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import type { LayoutOutput, SourceDocument } from '@sheetplan/shared';
import { MappingIngestorService } from '../layout/mapping-ingestor.service';
import { LayoutPromptBuilderService } from './layout-prompt-builder.service';
import { OpenAIClientService } from './openai-client.service';

/**
 * Asks a language model for a layout mapping and runs its answer through the
 * ingestor, so the result is held to the same invariants as the engine's.
 */
@Injectable()
export class LayoutProducerService {
  private readonly logger = new Logger(LayoutProducerService.name);

  constructor(
    private readonly openai: OpenAIClientService,
    private readonly promptBuilder: LayoutPromptBuilderService,
    private readonly ingestor: MappingIngestorService,
  ) {}

  async generate(documents: SourceDocument[]): Promise<LayoutOutput> {
    if (!this.openai.isAvailable()) {
      throw new ServiceUnavailableException({
        error: 'AI_UNAVAILABLE',
        message: 'AI_API_KEY is not configured; set it in .env to enable layout generation',
      });
    }

    const response = await this.openai.chat({
      systemPrompt: this.promptBuilder.buildSystemPrompt(),
      userMessage: this.promptBuilder.buildUserMessage(documents),
      responseFormat: 'json',
      temperature: 0,
    });

    this.logger.log(
      `Producer answered (length=${response.content.length}, finish=${response.finishReason}` +
      `${response.usage ? `, tokens=${response.usage.totalTokens}` : ''})`,
    );
    if (response.finishReason === 'length') {
      this.logger.warn('Producer output was cut off at the token limit; ingestion will likely fail');
    }

    return this.ingestor.ingest(response.content);
  }
}
