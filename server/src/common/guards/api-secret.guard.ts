/**
 * Atrium Roomserver - API Secret Guard
 *
 * Only internal components holding the shared secret may call the
 * roomserver API. The secret travels in the X-API-SECRET header.
 */

import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { Request } from 'express';

export const API_SECRET_HEADER = 'x-api-secret';

@Injectable()
export class ApiSecretGuard implements CanActivate {
  private readonly secret: Buffer;

  constructor(configService: ConfigService) {
    this.secret = Buffer.from(
      configService.getOrThrow<string>('security.apiSecret'),
    );
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const supplied = request.headers[API_SECRET_HEADER];
    if (typeof supplied !== 'string' || !this.matches(supplied)) {
      throw new UnauthorizedException('Missing or invalid API secret');
    }
    return true;
  }

  private matches(supplied: string): boolean {
    const candidate = Buffer.from(supplied);
    return (
      candidate.length === this.secret.length &&
      timingSafeEqual(candidate, this.secret)
    );
  }
}
