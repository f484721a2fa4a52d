import { Module } from '@nestjs/common';
import { ExportModule } from '../export/export.module';
import { LayoutModule } from '../layout/layout.module';
import { AIController } from './ai.controller';
import { LayoutProducerService } from './layout-producer.service';
import { LayoutPromptBuilderService } from './layout-prompt-builder.service';
import { OpenAIClientService } from './openai-client.service';

@Module({
  imports: [LayoutModule, ExportModule],
  controllers: [AIController],
  providers: [OpenAIClientService, LayoutPromptBuilderService, LayoutProducerService],
  exports: [LayoutProducerService],
})
export class AIModule {}
