import { Module } from '@nestjs/common';
import { TemplateStore } from './template-store.service';
import { TemplateRenderer } from './template-renderer.service';
import { TemplatesController } from './templates.controller';

/**
 * Template storage, rendering and the /templates, /generate-email-html
 * and /upload-template endpoints.
 *
 * Needs ConfigModule and LoggerModule imported by the root module.
 */
@Module({
  controllers: [TemplatesController],
  providers: [TemplateStore, TemplateRenderer],
  exports: [TemplateStore, TemplateRenderer],
})
export class TemplatesModule {}
