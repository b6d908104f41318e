export { TemplatesModule } from './templates.module';
export { TemplateStore, TEMPLATE_EXTENSION } from './template-store.service';
export { TemplateRenderer } from './template-renderer.service';
export { TemplatesController } from './templates.controller';
export type {
  RenderContext,
  TemplateHandle,
  UploadedTemplateFile,
} from './template.interface';
