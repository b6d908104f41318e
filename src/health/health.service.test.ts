import { describe, it, expect, rs, beforeEach } from '@rstest/core';
import { HealthService } from './health.service';
import type { TemplateDirectoryHealthIndicator } from './indicators/template-directory.indicator';
import type { MemoryHealthIndicator } from './indicators/memory.indicator';

describe('HealthService', () => {
  let healthService: HealthService;
  let mockDirectoryIndicator: TemplateDirectoryHealthIndicator;
  let mockMemoryIndicator: MemoryHealthIndicator;

  beforeEach(() => {
    mockDirectoryIndicator = {
      check: rs.fn().mockResolvedValue({ status: 'up', details: { directory: '/srv/templates' } }),
    } as unknown as TemplateDirectoryHealthIndicator;

    mockMemoryIndicator = {
      check: rs.fn().mockReturnValue({ status: 'up' }),
      setThreshold: rs.fn(),
    } as unknown as MemoryHealthIndicator;

    healthService = new HealthService(
      { templateDirectory: true, memory: { heapThreshold: 256 * 1024 * 1024 } },
      mockDirectoryIndicator,
      mockMemoryIndicator,
    );
    healthService.onModuleInit();
  });

  it('should pass the configured heap threshold to the memory indicator', () => {
    expect(mockMemoryIndicator.setThreshold).toHaveBeenCalledWith(256 * 1024 * 1024);
  });

  describe('check', () => {
    it('should return ok when the template directory and memory are up', async () => {
      const result = await healthService.check();

      expect(result.status).toBe('ok');
      expect(result.checks).toEqual({
        templateDirectory: { status: 'up', details: { directory: '/srv/templates' } },
        memory: { status: 'up' },
      });
      expect(new Date(result.timestamp).toISOString()).toBe(result.timestamp);
      expect(result.uptime).toBeGreaterThan(0);
    });

    it('should be degraded when the template directory is unavailable', async () => {
      rs.mocked(mockDirectoryIndicator.check).mockResolvedValue({
        status: 'down',
        details: { directory: '/srv/templates', error: 'EACCES' },
      });

      const result = await healthService.check();

      expect(result.status).toBe('degraded');
      expect(result.checks.templateDirectory.status).toBe('down');
    });

    it('should be degraded when the heap exceeds its threshold', async () => {
      rs.mocked(mockMemoryIndicator.check).mockReturnValue({ status: 'down' });

      expect((await healthService.check()).status).toBe('degraded');
    });

    it('should skip the directory check when it is disabled', async () => {
      const service = new HealthService(
        { memory: {} },
        mockDirectoryIndicator,
        mockMemoryIndicator,
      );

      const result = await service.check();

      expect(Object.keys(result.checks)).toEqual(['memory']);
      expect(mockDirectoryIndicator.check).not.toHaveBeenCalled();
    });
  });

  it('should report ok with no checks when no indicators are provided', async () => {
    const result = await new HealthService({}).check();

    expect(result.status).toBe('ok');
    expect(result.checks).toEqual({});
  });
});
