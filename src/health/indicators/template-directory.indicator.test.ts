import { describe, it, expect, beforeEach, afterEach } from '@rstest/core';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TemplateDirectoryHealthIndicator } from './template-directory.indicator';
import { loadServiceConfig } from '../../config/load-service-config';

describe('TemplateDirectoryHealthIndicator', () => {
  let root: string;
  let directory: string;
  let indicator: TemplateDirectoryHealthIndicator;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'template-health-'));
    directory = path.join(root, 'templates');
    indicator = new TemplateDirectoryHealthIndicator(
      loadServiceConfig({ TEMPLATE_DIR: directory }, root),
    );
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('check', () => {
    it('should return up status when the directory is accessible', async () => {
      fs.mkdirSync(directory);

      expect(await indicator.check()).toEqual({
        status: 'up',
        details: { directory },
      });
    });

    it('should return down status when the directory is missing', async () => {
      const result = await indicator.check();

      expect(result.status).toBe('down');
      expect(result.details?.directory).toBe(directory);
      expect(String(result.details?.error)).toMatch(/^ENOENT/);
    });
  });
});
