export * from './types.js';
export * from './config.js';
export * from './logger.js';
export { createServiceAccountAuth, GOOGLE_SCOPES } from './google-auth.js';
export { withRetry, isRetryableError, type RetryOptions } from './retry.js';
