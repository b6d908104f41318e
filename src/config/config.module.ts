import { Module, Global, DynamicModule } from '@nestjs/common';
import { SERVICE_CONFIG, type ServiceConfig } from './service-config.interface';

/**
 * Makes the startup configuration injectable
 *
 * @example
 * ConfigModule.forRoot(loadServiceConfig())
 */
@Global()
@Module({})
export class ConfigModule {
  static forRoot(config: Readonly<ServiceConfig>): DynamicModule {
    return {
      module: ConfigModule,
      global: true,
      providers: [
        {
          provide: SERVICE_CONFIG,
          useValue: config,
        },
      ],
      exports: [SERVICE_CONFIG],
    };
  }
}
