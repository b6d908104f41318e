import { describe, it, expect } from '@rstest/core';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { SERVICE_CONFIG } from './config/service-config.interface';
import { loadServiceConfig } from './config/load-service-config';
import { LoggingInterceptor } from './logging/logging.interceptor';
import { TemplatesModule } from './templates/templates.module';
import { MailModule } from './mail/mail.module';

describe('AppModule.forRoot', () => {
  const config = loadServiceConfig({}, '/srv');

  it('should provide the given configuration through ConfigModule', () => {
    const { imports = [] } = AppModule.forRoot(config);

    expect(imports[0]).toEqual(
      expect.objectContaining({
        module: ConfigModule,
        providers: [{ provide: SERVICE_CONFIG, useValue: config }],
      }),
    );
  });

  it('should import the template and mail feature modules', () => {
    const { imports = [] } = AppModule.forRoot(config);

    expect(imports).toContain(TemplatesModule);
    expect(imports).toContain(MailModule);
  });

  it('should register the status controller and logging interceptor', () => {
    const dynamicModule = AppModule.forRoot(config);

    expect(dynamicModule.controllers).toEqual([AppController]);
    expect(dynamicModule.providers).toEqual([
      { provide: APP_INTERCEPTOR, useClass: LoggingInterceptor },
    ]);
  });
});
