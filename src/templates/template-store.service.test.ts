import { describe, it, expect, rs, beforeEach, afterEach } from '@rstest/core';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TemplateStore } from './template-store.service';
import { loadServiceConfig } from '../config/load-service-config';
import type { LoggerService } from '../logging/logger.service';

describe('TemplateStore', () => {
  let root: string;
  let directory: string;
  let store: TemplateStore;
  let mockChildLogger: Partial<LoggerService>;

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'template-store-'));
    directory = path.join(root, 'templates');

    mockChildLogger = {
      debug: rs.fn(),
      info: rs.fn(),
      error: rs.fn(),
    };
    const mockLogger = {
      child: rs.fn().mockReturnValue(mockChildLogger),
    } as unknown as LoggerService;

    store = new TemplateStore(
      loadServiceConfig({ TEMPLATE_DIR: directory }, root),
      mockLogger,
    );
    await store.onModuleInit();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('onModuleInit', () => {
    it('should create the template directory', () => {
      expect(fs.statSync(directory).isDirectory()).toBe(true);
    });

    it('should leave an existing directory untouched', async () => {
      fs.writeFileSync(path.join(directory, 'kept.html'), '<p>kept</p>');

      await store.onModuleInit();

      expect(fs.readFileSync(path.join(directory, 'kept.html'), 'utf-8')).toBe(
        '<p>kept</p>',
      );
    });
  });

  describe('list', () => {
    it('should return an empty list for an empty directory', async () => {
      expect(await store.list()).toEqual({ ok: true, value: [] });
    });

    it('should list only .html files', async () => {
      fs.writeFileSync(path.join(directory, 'welcome.html'), 'Hi');
      fs.writeFileSync(path.join(directory, 'invoice.html'), 'Due');
      fs.writeFileSync(path.join(directory, 'notes.txt'), 'ignore');
      fs.mkdirSync(path.join(directory, 'archive.html'));

      const result = await store.list();

      expect(result.ok).toBe(true);
      expect(result.ok && [...result.value].sort()).toEqual([
        'invoice.html',
        'welcome.html',
      ]);
    });

    it('should report internal when the directory is gone', async () => {
      fs.rmSync(directory, { recursive: true, force: true });

      const result = await store.list();

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.kind).toBe('internal');
      expect(mockChildLogger.error).toHaveBeenCalledWith(
        'Failed to list templates',
        expect.any(Error),
        { directory },
      );
    });
  });

  describe('resolve', () => {
    it('should return a handle for an existing template', async () => {
      fs.writeFileSync(path.join(directory, 'welcome.html'), 'Hello {{ name }}');

      expect(await store.resolve('welcome.html')).toEqual({
        ok: true,
        value: {
          name: 'welcome.html',
          path: path.join(directory, 'welcome.html'),
          source: 'Hello {{ name }}',
        },
      });
    });

    it('should fail with not_found for a missing template', async () => {
      expect(await store.resolve('missing.html')).toEqual({
        ok: false,
        error: { kind: 'not_found', message: "Template 'missing.html' not found" },
      });
    });

    it('should not resolve names outside the directory', async () => {
      fs.writeFileSync(path.join(root, 'outside.html'), 'secret');

      expect(await store.resolve('../outside.html')).toEqual({
        ok: false,
        error: { kind: 'not_found', message: "Template '../outside.html' not found" },
      });
    });

    it('should not resolve a directory', async () => {
      fs.mkdirSync(path.join(directory, 'archive.html'));

      const result = await store.resolve('archive.html');

      expect(!result.ok && result.error.kind).toBe('not_found');
    });

    it('should not resolve an empty name', async () => {
      const result = await store.resolve('');

      expect(!result.ok && result.error.kind).toBe('not_found');
    });
  });

  describe('store', () => {
    it('should reject files without an .html extension', async () => {
      expect(await store.store('x.txt', Buffer.from('text'))).toEqual({
        ok: false,
        error: { kind: 'bad_request', message: 'Only HTML files are allowed' },
      });
      expect(fs.existsSync(path.join(directory, 'x.txt'))).toBe(false);
    });

    it('should write the file and list it afterwards', async () => {
      const result = await store.store('x.html', Buffer.from('<p>{{ body }}</p>'));

      expect(result).toEqual({ ok: true, value: 'x.html' });
      expect(fs.readFileSync(path.join(directory, 'x.html'), 'utf-8')).toBe(
        '<p>{{ body }}</p>',
      );
      expect(await store.list()).toEqual({ ok: true, value: ['x.html'] });
      expect(mockChildLogger.info).toHaveBeenCalledWith('Template stored', {
        filename: 'x.html',
        bytes: 17,
      });
    });

    it('should overwrite an existing template', async () => {
      await store.store('x.html', Buffer.from('first'));
      await store.store('x.html', Buffer.from('second'));

      expect(fs.readFileSync(path.join(directory, 'x.html'), 'utf-8')).toBe('second');
    });

    it('should reject names with path segments', async () => {
      expect(await store.store('../escape.html', Buffer.from('x'))).toEqual({
        ok: false,
        error: { kind: 'bad_request', message: 'Invalid template filename' },
      });
      expect(fs.existsSync(path.join(root, 'escape.html'))).toBe(false);
    });

    it('should reject a bare extension', async () => {
      const result = await store.store('.html', Buffer.from('x'));

      expect(!result.ok && result.error.message).toBe('Invalid template filename');
    });

    it('should report internal when the write fails', async () => {
      fs.rmSync(directory, { recursive: true, force: true });

      const result = await store.store('x.html', Buffer.from('x'));

      expect(!result.ok && result.error.kind).toBe('internal');
      expect(!result.ok && result.error.message).toMatch(
        /^Failed to store template 'x.html': /,
      );
    });
  });
});
