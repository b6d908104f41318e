import type { DynamicModule, INestApplication, Type } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule } from '@nestjs/swagger';
import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import helmet from 'helmet';
import compression from 'compression';
import express from 'express';
import { AppModule } from '../app.module';
import { loadServiceConfig } from '../config/load-service-config';
import { LoggerService } from '../logging/logger.service';
import { createSwaggerDocument, type SwaggerConfig } from '../open-api-docs/create-swagger-document';
import { readPackageJson, titleCase } from '../utils/package-json';

export interface CreateAppOptions {
  /** Prefix for every route except health, e.g. "api" */
  globalPrefix?: string;
  /** Largest accepted JSON or form body, defaults to "1mb" */
  bodyLimit?: string;
  /** Swagger UI, mounted outside production only */
  swagger?: SwaggerConfig;
  /** Default: true */
  enableShutdownHooks?: boolean;
}

const HEALTH_ROUTES = ['health', 'health/ping'];

/**
 * Load the nearest .env, searching from `startDir` up to the filesystem root.
 * Variables already present in the environment win over the file.
 *
 * @returns the file that was loaded, if any
 */
export function loadEnvIfExists(startDir: string = process.cwd()): string | undefined {
  let dir = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(dir, '.env');
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return candidate;
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/**
 * Create the HTTP application with the standard middleware stack.
 * The caller decides when to listen.
 */
export async function createApp(
  module: Type<unknown> | DynamicModule,
  options: CreateAppOptions = {},
): Promise<INestApplication> {
  const app = await NestFactory.create(module, { bodyParser: false });
  const bodyLimit = options.bodyLimit ?? '1mb';

  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: bodyLimit }));
  app.enableCors();

  if (options.globalPrefix) {
    app.setGlobalPrefix(options.globalPrefix, { exclude: HEALTH_ROUTES });
  }

  if (options.enableShutdownHooks !== false) {
    app.enableShutdownHooks();
  }

  if (options.swagger && process.env.NODE_ENV !== 'production') {
    const document = createSwaggerDocument(app, options.swagger);
    SwaggerModule.setup(options.swagger.path ?? 'docs', app, document);
  }

  return app;
}

/**
 * Boot the service: .env, configuration, application, listener.
 *
 * @example
 * // src/main.ts
 * import 'reflect-metadata';
 * import { startApp } from './bootstrap/create-app';
 *
 * startApp().catch((error) => { ... });
 */
export async function startApp(): Promise<INestApplication> {
  loadEnvIfExists();

  const packageJson = readPackageJson();
  process.env.SERVICE_NAME ??= packageJson.name;

  const config = loadServiceConfig();
  const app = await createApp(AppModule.forRoot(config), {
    swagger: {
      title: titleCase(packageJson.name),
      description: packageJson.description,
      version: packageJson.version,
      tags: ['templates', 'mail'],
    },
  });

  await app.listen(config.http.port, config.http.host);

  const logger = app.get(LoggerService).child('Bootstrap');
  logger.info('Service listening', {
    url: `http://${config.http.host}:${config.http.port}`,
    templateDir: config.templateDir,
    transport: config.transport,
  });

  return app;
}
