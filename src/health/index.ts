export { HealthModule } from './health.module';
export { HealthController } from './health.controller';
export { HealthService } from './health.service';
export { TemplateDirectoryHealthIndicator } from './indicators/template-directory.indicator';
export { MemoryHealthIndicator } from './indicators/memory.indicator';
export type {
  HealthModuleOptions,
  HealthCheckResult,
  HealthIndicatorResult,
} from './health.interface';
