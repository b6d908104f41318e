import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';

export interface StatusResponse {
  message: string;
}

@ApiTags('status')
@Controller()
export class AppController {
  @Get()
  status(): StatusResponse {
    return { message: 'Email Generator API is running' };
  }
}
