import { Module, DynamicModule } from '@nestjs/common';
import { LoggerService } from './logger.service';
import { LOGGER_MODULE_OPTIONS, type LoggerModuleOptions } from './logger.interface';

/**
 * Global pino-backed LoggerService
 *
 * @example
 * LoggerModule.forRoot({
 *   level: 'debug',
 *   redactPaths: ['context.resetToken'],
 * })
 */
@Module({})
export class LoggerModule {
  static forRoot(options: LoggerModuleOptions = {}): DynamicModule {
    return {
      module: LoggerModule,
      global: true,
      providers: [
        { provide: LOGGER_MODULE_OPTIONS, useValue: options },
        {
          provide: LoggerService,
          useFactory: (moduleOptions: LoggerModuleOptions) => new LoggerService(moduleOptions),
          inject: [LOGGER_MODULE_OPTIONS],
        },
      ],
      exports: [LoggerService],
    };
  }
}
