import { Module } from '@nestjs/common';
import { XlsxRendererService } from './xlsx-renderer.service';

@Module({
  providers: [XlsxRendererService],
  exports: [XlsxRendererService],
})
export class ExportModule {}
