import { Injectable } from '@nestjs/common';
import type { HealthIndicatorResult } from '../health.interface';

const DEFAULT_HEAP_THRESHOLD = 500 * 1024 * 1024; // 500MB

const toMegabytes = (bytes: number): number => Math.round(bytes / 1024 / 1024);

/**
 * Compares heap usage of the rendering process against a threshold.
 * Template compilation happens per request, so a growing heap is the
 * first sign of trouble.
 */
@Injectable()
export class MemoryHealthIndicator {
  private heapThreshold = DEFAULT_HEAP_THRESHOLD;

  setThreshold(bytes: number): void {
    if (!Number.isFinite(bytes) || bytes <= 0) {
      throw new RangeError(`Heap threshold must be a positive number of bytes, got ${bytes}`);
    }
    this.heapThreshold = bytes;
  }

  check(): HealthIndicatorResult {
    const { heapUsed, heapTotal, rss } = this.readUsage();
    const details = {
      heapUsed: toMegabytes(heapUsed),
      heapTotal: toMegabytes(heapTotal),
      heapThreshold: toMegabytes(this.heapThreshold),
      rss: toMegabytes(rss),
      unit: 'MB',
    };

    return {
      status: heapUsed > this.heapThreshold ? 'down' : 'up',
      details,
    };
  }

  protected readUsage(): NodeJS.MemoryUsage {
    return process.memoryUsage();
  }
}
