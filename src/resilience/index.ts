/**
 * Resilience exports.
 */

export type { RetryConfig } from './retry';
export { RetryPolicy, DEFAULT_RETRY_CONFIG } from './retry';
