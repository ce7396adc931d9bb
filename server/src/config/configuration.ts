/**
 * Atrium Roomserver - Application Configuration
 *
 * Centralized configuration management with environment variable support.
 * All configuration values are validated using Joi schemas.
 */

export const configuration = () => ({
  app: {
    name: process.env.APP_NAME || 'Atrium Roomserver',
    env: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '7770', 10),
    url: process.env.APP_URL || 'http://localhost:7770',
    // The homeserver domain; users and aliases under it are resolved locally.
    serverName: process.env.SERVER_NAME || 'localhost',
  },
  cors: {
    origins: process.env.CORS_ORIGINS || 'https://localhost',
  },
});
