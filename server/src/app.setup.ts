/**
 * Atrium Roomserver - HTTP Application Setup
 *
 * Middleware, validation and routing shared by the server entry point and
 * the end-to-end tests.
 */

import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import compression from 'compression';
import helmet from 'helmet';

export function configureApp(app: INestApplication): INestApplication {
  const configService = app.get(ConfigService);

  // Security middleware - Helmet sets various HTTP headers
  app.use(helmet());

  // Compression middleware - reduces response size
  app.use(compression());

  // CORS configuration
  const corsOrigins = configService.get<string>('cors.origins', 'https://localhost').split(',');
  app.enableCors({
    origin: corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-API-SECRET'],
  });

  // Global validation pipe - validates all incoming requests
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip properties that don't have decorators
      forbidNonWhitelisted: true, // Throw error if non-whitelisted properties exist
      transform: true,
    }),
  );

  // Global prefix for all routes
  app.setGlobalPrefix('api');

  return app;
}
