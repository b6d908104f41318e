import { Module, DynamicModule, type Provider } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { TemplateDirectoryHealthIndicator } from './indicators/template-directory.indicator';
import { MemoryHealthIndicator } from './indicators/memory.indicator';
import { HEALTH_MODULE_OPTIONS, type HealthModuleOptions } from './health.interface';

const DEFAULT_OPTIONS: HealthModuleOptions = {
  templateDirectory: true,
  memory: {},
};

@Module({
  controllers: [HealthController],
  providers: [
    HealthService,
    MemoryHealthIndicator,
    TemplateDirectoryHealthIndicator,
    {
      provide: HEALTH_MODULE_OPTIONS,
      useValue: DEFAULT_OPTIONS,
    },
  ],
  exports: [HealthService],
})
export class HealthModule {
  static forRoot(options: HealthModuleOptions = DEFAULT_OPTIONS): DynamicModule {
    const providers: Provider[] = [HealthService, MemoryHealthIndicator];

    if (options.templateDirectory) {
      providers.push(TemplateDirectoryHealthIndicator);
    }

    return {
      module: HealthModule,
      controllers: [HealthController],
      providers: [
        ...providers,
        {
          provide: HEALTH_MODULE_OPTIONS,
          useValue: options,
        },
      ],
      exports: [HealthService],
    };
  }
}
