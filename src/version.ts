/** Package version, sent in the User-Agent header. */
export const VERSION = '1.0.0';
