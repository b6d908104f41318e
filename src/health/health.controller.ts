import { Controller, Get, Inject } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { HealthService } from './health.service';
import type { HealthCheckResult } from './health.interface';

@ApiExcludeController()
@Controller('health')
export class HealthController {
  constructor(@Inject(HealthService) private readonly healthService: HealthService) {}

  @Get()
  async healthCheck(): Promise<HealthCheckResult> {
    return this.healthService.check();
  }

  @Get('ping')
  ping(): { message: string; timestamp: string } {
    return { message: 'pong', timestamp: new Date().toISOString() };
  }
}
