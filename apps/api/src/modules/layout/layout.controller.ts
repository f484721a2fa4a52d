import { Body, Controller, HttpCode, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';
import { ingestRequestSchema, layoutRequestSchema, toWirePlan } from '@sheetplan/shared';
import type { IngestRequestInput, LayoutRequestInput, WireSheet } from '@sheetplan/shared';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { sendWorkbook } from '../../common/utils/xlsx-reply';
import { LayoutService } from './layout.service';

@ApiTags('layouts')
@Controller('api/layouts')
export class LayoutController {
  constructor(private readonly layoutService: LayoutService) {}

  @Post('plan')
  @HttpCode(200)
  @ApiOperation({ summary: 'Compute the styled cell mapping for extracted documents' })
  @ApiResponse({ status: 200, description: 'Sheets in workbook order, each as {sheet_name, cells}' })
  plan(@Body(new ZodValidationPipe(layoutRequestSchema)) body: LayoutRequestInput): WireSheet[] {
    const layout = this.layoutService.buildLayout(body.documents, {
      sheetNameConflict: body.sheetNameConflict,
    });
    return toWirePlan(layout);
  }

  @Post('render')
  @ApiOperation({ summary: 'Lay out extracted documents and download the workbook' })
  @ApiResponse({ status: 200, description: 'XLSX file' })
  async render(
    @Body(new ZodValidationPipe(layoutRequestSchema)) body: LayoutRequestInput,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const layout = this.layoutService.buildLayout(body.documents, {
      sheetNameConflict: body.sheetNameConflict,
    });
    const buffer = await this.layoutService.renderToBuffer(layout);
    sendWorkbook(reply, buffer, `${layout[0]?.name ?? 'layout'}.xlsx`);
  }

  @Post('ingest')
  @ApiOperation({ summary: 'Render a layout mapping supplied by an external producer' })
  @ApiResponse({ status: 200, description: 'XLSX file' })
  async ingest(
    @Body(new ZodValidationPipe(ingestRequestSchema)) body: IngestRequestInput,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const layout = this.layoutService.ingest(body.text);
    const buffer = await this.layoutService.renderToBuffer(layout);
    sendWorkbook(reply, buffer, `${layout[0]?.name ?? 'layout'}.xlsx`);
  }
}
