import { INestApplication } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder, OpenAPIObject } from '@nestjs/swagger';

export interface SwaggerConfig {
  title: string;
  description: string;
  version?: string; // defaults to "1.0.0"
  tags?: string[];
  /** Mount path for the UI, defaults to "docs" */
  path?: string;
}

export function createSwaggerDocument(
  app: INestApplication,
  config: SwaggerConfig,
): OpenAPIObject {
  const builder = new DocumentBuilder()
    .setTitle(config.title)
    .setDescription(config.description)
    .setVersion(config.version || '1.0.0');

  for (const tag of config.tags ?? []) {
    builder.addTag(tag);
  }

  return SwaggerModule.createDocument(app, builder.build());
}
