/**
 * Atrium Roomserver - Federation Configuration
 *
 * Location of the federation sender's internal API, used for directory
 * lookups of aliases owned by other servers.
 */

export const federationConfig = () => ({
  federation: {
    senderUrl: process.env.FEDERATION_SENDER_URL || 'http://localhost:7771',
    peekTimeoutMs: parseInt(process.env.PEEK_TIMEOUT_MS || '10000', 10),
  },
});
