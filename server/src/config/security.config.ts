/**
 * Atrium Roomserver - Security Configuration
 *
 * Shared secret for internal API callers and request rate limits.
 */

export const securityConfig = () => ({
  security: {
    apiSecret: process.env.API_SHARED_SECRET || 'change-me-now',
    rateLimit: {
      ttl: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10),
      limit: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
    },
  },
});
