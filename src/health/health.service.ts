import { Injectable, Optional, Inject, OnModuleInit } from '@nestjs/common';
import {
  HEALTH_MODULE_OPTIONS,
  type HealthCheckResult,
  type HealthIndicatorResult,
  type HealthModuleOptions,
} from './health.interface';
import { TemplateDirectoryHealthIndicator } from './indicators/template-directory.indicator';
import { MemoryHealthIndicator } from './indicators/memory.indicator';

@Injectable()
export class HealthService implements OnModuleInit {
  constructor(
    @Inject(HEALTH_MODULE_OPTIONS) private readonly options: HealthModuleOptions,
    @Optional()
    @Inject(TemplateDirectoryHealthIndicator)
    private readonly templateDirectoryIndicator?: TemplateDirectoryHealthIndicator,
    @Optional()
    @Inject(MemoryHealthIndicator)
    private readonly memoryIndicator?: MemoryHealthIndicator,
  ) {}

  onModuleInit(): void {
    if (this.options.memory?.heapThreshold && this.memoryIndicator) {
      this.memoryIndicator.setThreshold(this.options.memory.heapThreshold);
    }
  }

  async check(): Promise<HealthCheckResult> {
    const checks: Record<string, HealthIndicatorResult> = {};

    if (this.options.templateDirectory && this.templateDirectoryIndicator) {
      checks.templateDirectory = await this.templateDirectoryIndicator.check();
    }

    if (this.options.memory && this.memoryIndicator) {
      checks.memory = this.memoryIndicator.check();
    }

    const degraded = Object.values(checks).some((check) => check.status === 'down');
    const memoryUsage = process.memoryUsage();

    return {
      status: degraded ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks,
      memory: {
        used: Math.round(memoryUsage.heapUsed / 1024 / 1024),
        total: Math.round(memoryUsage.heapTotal / 1024 / 1024),
      },
    };
  }
}
