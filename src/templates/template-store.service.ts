/**
 * Template Store
 *
 * Directory of HTML template files. A template's file name is its key.
 * Uploads overwrite any file of the same name; there is no locking, so
 * concurrent uploads of one name end with whichever write lands last.
 */
import { Injectable, Inject, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { SERVICE_CONFIG, type ServiceConfig } from '../config/service-config.interface';
import { LoggerService } from '../logging/logger.service';
import {
  ok,
  badRequest,
  notFound,
  internal,
  errorMessage,
  type OperationResult,
} from '../common/result';
import { hasErrorCode } from '../common/fs-errors';
import type { TemplateHandle } from './template.interface';

export const TEMPLATE_EXTENSION = '.html';

@Injectable()
export class TemplateStore implements OnModuleInit {
  private readonly directory: string;
  private readonly logger: LoggerService;

  constructor(
    @Inject(SERVICE_CONFIG) config: Readonly<ServiceConfig>,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    this.directory = config.templateDir;
    this.logger = logger.child('TemplateStore');
  }

  /**
   * Create the template directory if it does not exist yet
   */
  async onModuleInit(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    this.logger.debug('Template directory ready', { directory: this.directory });
  }

  /**
   * Names of the .html files in the directory, in enumeration order
   */
  async list(): Promise<OperationResult<string[]>> {
    try {
      const entries = await fs.promises.readdir(this.directory, {
        withFileTypes: true,
      });

      return ok(
        entries
          .filter((entry) => entry.isFile() && entry.name.endsWith(TEMPLATE_EXTENSION))
          .map((entry) => entry.name),
      );
    } catch (error) {
      this.logger.error('Failed to list templates', error, {
        directory: this.directory,
      });
      return internal(`Failed to list templates: ${errorMessage(error)}`);
    }
  }

  async resolve(name: string): Promise<OperationResult<TemplateHandle>> {
    const filePath = this.pathInside(name);
    if (!filePath) {
      return notFound(`Template '${name}' not found`);
    }

    try {
      const source = await fs.promises.readFile(filePath, 'utf-8');
      return ok({ name, path: filePath, source });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR', 'EISDIR')) {
        return notFound(`Template '${name}' not found`);
      }

      this.logger.error('Failed to read template', error, { name });
      return internal(`Failed to read template '${name}': ${errorMessage(error)}`);
    }
  }

  /**
   * Write a template, replacing any existing file of the same name
   */
  async store(filename: string, content: Buffer): Promise<OperationResult<string>> {
    if (!filename.endsWith(TEMPLATE_EXTENSION)) {
      return badRequest('Only HTML files are allowed');
    }

    if (
      filename === TEMPLATE_EXTENSION ||
      filename !== path.basename(filename) ||
      filename.includes('\\')
    ) {
      return badRequest('Invalid template filename');
    }

    const filePath = path.join(this.directory, filename);

    try {
      await fs.promises.writeFile(filePath, content);
    } catch (error) {
      this.logger.error('Failed to store template', error, { filename });
      return internal(`Failed to store template '${filename}': ${errorMessage(error)}`);
    }

    this.logger.info('Template stored', { filename, bytes: content.length });
    return ok(filename);
  }

  /**
   * Absolute path for a template name, or undefined if it would escape the directory
   */
  private pathInside(name: string): string | undefined {
    if (!name) {
      return undefined;
    }

    const filePath = path.resolve(this.directory, name);
    const relative = path.relative(this.directory, filePath);

    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      return undefined;
    }

    return filePath;
  }
}

