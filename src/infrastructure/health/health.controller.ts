import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';

interface HealthResponse {
  status: string;
  timestamp: string;
  uptime: number;
  service: string;
}

@ApiTags('Service')
@Controller('health')
export class HealthController {
  constructor(private readonly config: ConfigService) {}

  // Liveness only; does not touch the storage backend.
  @Get()
  @ApiOkResponse({ description: 'Service is up' })
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: this.config.get<string>('app.serviceName', 'bucket-health'),
    };
  }
}
