/**
 * Todos API - Health Controller
 * Health check endpoint
 */

import { Controller, Get } from '@nestjs/common';

@Controller('health')
export class HealthController {
  @Get()
  health() {
    return {
      status: 'healthy',
      service: 'todos-api',
      timestamp: new Date().toISOString(),
    };
  }
}
