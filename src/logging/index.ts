export { LoggerService } from './logger.service';
export type { LogContext } from './logger.service';
export { LoggerModule } from './logger.module';
export {
  LoggingInterceptor,
  CORRELATION_HEADER,
  resolveCorrelationId,
  describeMailRequest,
} from './logging.interceptor';
export type { LoggerModuleOptions } from './logger.interface';
export { DEFAULT_REDACT_PATHS, LOGGER_MODULE_OPTIONS } from './logger.interface';
export type { LogLevel } from './logger.interface';
