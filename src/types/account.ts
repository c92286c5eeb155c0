/**
 * Account endpoint types.
 */

/**
 * Balance for the API key in use, as returned by the server.
 */
export type BalanceResponse = Record<string, unknown>;

/**
 * Usage report for a trailing window of days, as returned by the server.
 */
export type UsageReport = Record<string, unknown>;

/**
 * Default look-back window for usage reports, in days.
 */
export const DEFAULT_USAGE_DAYS = 30;
