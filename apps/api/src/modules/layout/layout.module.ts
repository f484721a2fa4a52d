import { Module } from '@nestjs/common';
import { ExportModule } from '../export/export.module';
import { ColumnDetectorService } from './column-detector.service';
import { FieldNormalizerService } from './field-normalizer.service';
import { LayoutController } from './layout.controller';
import { LayoutPlannerService } from './layout-planner.service';
import { LayoutService } from './layout.service';
import { LayoutValidatorService } from './layout-validator.service';
import { MappingAssemblerService } from './mapping-assembler.service';
import { MappingIngestorService } from './mapping-ingestor.service';
import { StyleResolverService } from './style-resolver.service';

@Module({
  imports: [ExportModule],
  controllers: [LayoutController],
  providers: [
    ColumnDetectorService,
    FieldNormalizerService,
    LayoutPlannerService,
    StyleResolverService,
    MappingAssemblerService,
    LayoutValidatorService,
    MappingIngestorService,
    LayoutService,
  ],
  exports: [LayoutService, MappingIngestorService],
})
export class LayoutModule {}
