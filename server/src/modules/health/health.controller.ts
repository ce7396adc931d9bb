/**
 * Atrium Roomserver - Health Controller
 *
 * Liveness and readiness probes for orchestrators and load balancers.
 * Probes are exempt from rate limiting and need no API secret.
 */

import { Controller, Get } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { HealthService } from './health.service';

@Controller('health')
@SkipThrottle()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  check() {
    return this.healthService.check();
  }

  // 503 while the database is unreachable.
  @Get('ready')
  readiness() {
    return this.healthService.readiness();
  }

  @Get('live')
  liveness() {
    return this.healthService.liveness();
  }
}
