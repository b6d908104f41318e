import { Module, DynamicModule } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule } from './config/config.module';
import type { ServiceConfig } from './config/service-config.interface';
import { LoggerModule, LoggingInterceptor } from './logging';
import { HealthModule } from './health';
import { TemplatesModule } from './templates';
import { MailModule } from './mail';
import { AppController } from './app.controller';

@Module({})
export class AppModule {
  /**
   * @example
   * NestFactory.create(AppModule.forRoot(loadServiceConfig()))
   */
  static forRoot(config: Readonly<ServiceConfig>): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot(config),
        LoggerModule.forRoot(),
        HealthModule.forRoot({ templateDirectory: true, memory: {} }),
        TemplatesModule,
        MailModule,
      ],
      controllers: [AppController],
      providers: [
        {
          provide: APP_INTERCEPTOR,
          useClass: LoggingInterceptor,
        },
      ],
    };
  }
}
