export const HEALTH_MODULE_OPTIONS = 'HEALTH_MODULE_OPTIONS';

export interface HealthIndicatorResult {
  status: 'up' | 'down';
  details?: Record<string, unknown>;
}

export interface HealthCheckResult {
  status: 'ok' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: Record<string, HealthIndicatorResult>;
  memory: {
    used: number;
    total: number;
  };
}

export interface HealthModuleOptions {
  /**
   * Check that the template directory is readable and writable
   * Requires ConfigModule to be imported
   */
  templateDirectory?: boolean;

  /**
   * Memory health indicator options
   */
  memory?: {
    /**
     * Heap threshold in bytes. If exceeded, status becomes 'degraded'
     * Default: 500MB (500 * 1024 * 1024)
     */
    heapThreshold?: number;
  };
}
