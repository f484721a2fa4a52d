import { Body, Controller, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';
import { generateRequestSchema } from '@sheetplan/shared';
import type { GenerateRequestInput } from '@sheetplan/shared';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { sendWorkbook } from '../../common/utils/xlsx-reply';
import { XlsxRendererService } from '../export/xlsx-renderer.service';
import { LayoutProducerService } from './layout-producer.service';

@ApiTags('layouts')
@Controller('api/layouts')
export class AIController {
  constructor(
    private readonly producer: LayoutProducerService,
    private readonly renderer: XlsxRendererService,
  ) {}

  @Post('generate')
  @ApiOperation({ summary: 'Have a language model propose the layout, validate it, and download the workbook' })
  @ApiResponse({ status: 200, description: 'XLSX file' })
  @ApiResponse({ status: 503, description: 'No AI provider configured' })
  async generate(
    @Body(new ZodValidationPipe(generateRequestSchema)) body: GenerateRequestInput,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const layout = await this.producer.generate(body.documents);
    const buffer = await this.renderer.renderToBuffer(layout);
    sendWorkbook(reply, buffer, `${layout[0]?.name ?? 'layout'}.xlsx`);
  }
}
