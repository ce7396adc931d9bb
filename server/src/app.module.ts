/**
 * Atrium Roomserver - Root Application Module
 *
 * Configures all modules, services, and dependencies for the NestJS application.
 * This is the root module that imports all feature modules.
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { HealthModule } from './modules/health/health.module';
import { PeekModule } from './modules/peek/peek.module';
import { configuration } from './config/configuration';
import { databaseConfig } from './config/database.config';
import { federationConfig } from './config/federation.config';
import { securityConfig } from './config/security.config';
import { validationSchema } from './config/validation.schema';

@Module({
  imports: [
    // Configuration module with validation
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration, databaseConfig, federationConfig, securityConfig],
      validationSchema,
    }),

    // Rate limiting - prevents abuse
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          ttl: configService.get<number>('security.rateLimit.ttl', 60000),
          limit: configService.get<number>('security.rateLimit.limit', 100),
        },
      ],
    }),

    // Feature modules
    HealthModule,
    PeekModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule {}
