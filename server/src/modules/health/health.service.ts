/**
 * Atrium Roomserver - Health Service
 *
 * Implements health check logic including database connectivity
 * and service availability checks.
 */

import { Injectable, ServiceUnavailableException } from '@nestjs/common';
import { SqliteService } from '../storage/sqlite.service';

@Injectable()
export class HealthService {
  constructor(private readonly sqlite: SqliteService) {}

  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  readiness() {
    if (!this.databaseReachable()) {
      throw new ServiceUnavailableException({ status: 'unavailable', database: 'down' });
    }
    return {
      status: 'ready',
      database: 'up',
      timestamp: new Date().toISOString(),
    };
  }

  liveness() {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
    };
  }

  private databaseReachable(): boolean {
    try {
      return this.sqlite.ping();
    } catch {
      return false;
    }
  }
}
