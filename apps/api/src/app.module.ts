import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.config';
import { LayoutModule } from './modules/layout/layout.module';
import { ExportModule } from './modules/export/export.module';
import { AIModule } from './modules/ai/ai.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    ExportModule,
    LayoutModule,
    AIModule,
  ],
})
export class AppModule { }
