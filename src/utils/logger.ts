import pino from 'pino';

/**
 * Paths that may carry custody secrets. Values under these keys are replaced
 * before a log line is written.
 */
export const REDACTED_PATHS = [
  'secret',
  'privateKey',
  'walletSecret',
  '*.secret',
  '*.privateKey',
  '*.walletSecret',
  'wallet.secret',
  'config.WALLET_ENCRYPTION_KEY',
  'config.POSTGRES_PASSWORD',
  'config.REDIS_PASSWORD'
];

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'custodial-swap-engine' },
  redact: {
    paths: REDACTED_PATHS,
    censor: '***'
  },
  timestamp: pino.stdTimeFunctions.isoTime
});
