import { Injectable, Inject } from '@nestjs/common';
import * as fs from 'fs';
import { SERVICE_CONFIG, type ServiceConfig } from '../../config/service-config.interface';
import { errorMessage } from '../../common/result';
import type { HealthIndicatorResult } from '../health.interface';

/**
 * Up while the template directory can be read and written
 */
@Injectable()
export class TemplateDirectoryHealthIndicator {
  constructor(@Inject(SERVICE_CONFIG) private readonly config: Readonly<ServiceConfig>) {}

  async check(): Promise<HealthIndicatorResult> {
    const directory = this.config.templateDir;

    try {
      await fs.promises.access(directory, fs.constants.R_OK | fs.constants.W_OK);
      return { status: 'up', details: { directory } };
    } catch (error) {
      return {
        status: 'down',
        details: { directory, error: errorMessage(error) },
      };
    }
  }
}
