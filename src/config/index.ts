/**
 * Configuration module for the Orangic client.
 */

import { z } from 'zod';
import { AuthenticationError, OrangicError } from '../errors';
import { VERSION } from '../version';

/** Default base URL for the Orangic API. */
export const DEFAULT_BASE_URL = 'https://api.orangic.chat';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 600000;

/** Default retry budget. */
export const DEFAULT_MAX_RETRIES = 2;

/** Environment variable holding the API key. */
export const API_KEY_ENV_VAR = 'ORANGIC_API_KEY';

/** User-Agent sent with every request. */
export const USER_AGENT = `orangic-node/${VERSION}`;

/**
 * Configuration options for the Orangic client.
 */
export interface OrangicConfigOptions {
  /** API key. Falls back to the ORANGIC_API_KEY environment variable. */
  apiKey?: string;
  /** Base URL for API requests. */
  baseUrl?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Retry budget for callers that wrap requests in a retry policy. */
  maxRetries?: number;
  /** Custom headers to include in requests. */
  customHeaders?: Record<string, string>;
}

const configSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url(),
  timeout: z.number().positive(),
  maxRetries: z.number().int().nonnegative(),
  customHeaders: z.record(z.string()),
});

/**
 * Immutable configuration for the Orangic client.
 */
export class OrangicConfig {
  /** API key for authentication. */
  readonly apiKey: string;
  /** Base URL without a trailing slash. */
  readonly baseUrl: string;
  /** Request timeout in milliseconds. */
  readonly timeout: number;
  /** Retry budget. */
  readonly maxRetries: number;
  /** Custom headers. */
  readonly customHeaders: Readonly<Record<string, string>>;
  /** User-Agent header value. */
  readonly userAgent: string = USER_AGENT;

  private constructor(values: z.infer<typeof configSchema>) {
    this.apiKey = values.apiKey;
    this.baseUrl = values.baseUrl;
    this.timeout = values.timeout;
    this.maxRetries = values.maxRetries;
    this.customHeaders = Object.freeze({ ...values.customHeaders });
    Object.freeze(this);
  }

  /**
   * Resolves and validates a configuration. Throws AuthenticationError when
   * neither the options nor the environment provide an API key.
   */
  static create(options: OrangicConfigOptions = {}): OrangicConfig {
    const apiKey = options.apiKey || process.env[API_KEY_ENV_VAR];
    if (!apiKey) {
      throw new AuthenticationError(
        `No API key provided. Set ${API_KEY_ENV_VAR} environment variable or pass the apiKey option.`
      );
    }

    const result = configSchema.safeParse({
      apiKey,
      baseUrl: (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      customHeaders: options.customHeaders ?? {},
    });
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw OrangicError.configuration(`Invalid configuration: ${issues.join(', ')}`);
    }

    return new OrangicConfig(result.data);
  }

  /**
   * Creates a configuration from environment variables.
   */
  static fromEnv(): OrangicConfig {
    return OrangicConfig.create(optionsFromEnv());
  }

  /**
   * Creates a new configuration builder.
   */
  static builder(): OrangicConfigBuilder {
    return new OrangicConfigBuilder();
  }
}

/**
 * Reads client options from ORANGIC_* environment variables. Numeric values
 * that do not parse are ignored.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): OrangicConfigOptions {
  const options: OrangicConfigOptions = {};

  const apiKey = env[API_KEY_ENV_VAR];
  if (apiKey) {
    options.apiKey = apiKey;
  }

  const baseUrl = env['ORANGIC_BASE_URL'];
  if (baseUrl) {
    options.baseUrl = baseUrl;
  }

  const timeout = env['ORANGIC_TIMEOUT'];
  if (timeout) {
    const ms = parseInt(timeout, 10);
    if (!isNaN(ms)) {
      options.timeout = ms;
    }
  }

  const maxRetries = env['ORANGIC_MAX_RETRIES'];
  if (maxRetries) {
    const retries = parseInt(maxRetries, 10);
    if (!isNaN(retries)) {
      options.maxRetries = retries;
    }
  }

  return options;
}

/**
 * Builder for OrangicConfig.
 */
export class OrangicConfigBuilder {
  private readonly options: OrangicConfigOptions = {};

  apiKey(key: string): this {
    this.options.apiKey = key;
    return this;
  }

  baseUrl(url: string): this {
    this.options.baseUrl = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  /**
   * Sets the timeout in seconds.
   */
  timeoutSecs(secs: number): this {
    this.options.timeout = secs * 1000;
    return this;
  }

  maxRetries(retries: number): this {
    this.options.maxRetries = retries;
    return this;
  }

  /**
   * Adds a custom header.
   */
  header(name: string, value: string): this {
    this.options.customHeaders = { ...this.options.customHeaders, [name]: value };
    return this;
  }

  build(): OrangicConfig {
    return OrangicConfig.create(this.options);
  }
}
