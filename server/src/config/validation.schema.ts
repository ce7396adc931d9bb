/**
 * Atrium Roomserver - Configuration Validation Schema
 *
 * Uses Joi to validate environment variables and configuration.
 * Ensures all required values are present and properly formatted.
 */

import * as Joi from 'joi';

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(7770),
  APP_URL: Joi.string().uri().default('http://localhost:7770'),
  CORS_ORIGINS: Joi.string().default('https://localhost'),
  // Homeserver name: DNS name, IPv4 or bracketed IPv6 literal, optional port
  SERVER_NAME: Joi.string()
    .pattern(/^([A-Za-z0-9.-]+|\[[0-9A-Fa-f:.]+\])(:\d{1,5})?$/)
    .required(),

  // Database
  DB_PATH: Joi.string().default('roomserver.db'),
  DB_WAL: Joi.string().valid('true', 'false').default('true'),

  // Federation
  FEDERATION_SENDER_URL: Joi.string().uri().default('http://localhost:7771'),
  PEEK_TIMEOUT_MS: Joi.number().min(100).default(10000),

  // Security
  API_SHARED_SECRET: Joi.string().min(16).required(),
  RATE_LIMIT_WINDOW_MS: Joi.number().default(60000),
  RATE_LIMIT_MAX: Joi.number().min(1).default(100),
});

export default validationSchema;
