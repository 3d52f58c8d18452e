import { Controller, Get } from '@nestjs/common';

/**
 * Liveness probe
 *
 * GET /health
 */
@Controller('health')
export class HealthController {
  @Get()
  check(): { status: 'ok'; timestamp: string } {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }
}
