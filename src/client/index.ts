/**
 * Main Orangic client implementation.
 */

import { BearerAuthProvider } from '../auth';
import { OrangicConfig, OrangicConfigOptions, optionsFromEnv } from '../config';
import { ConsoleLogger, Logger, LogLevel, NoopLogger } from '../observability';
import { RetryPolicy } from '../resilience';
import { AccountService, DefaultAccountService } from '../services/account';
import { ChatService, DefaultChatService } from '../services/chat';
import { AxiosTransport, HttpTransport } from '../transport';
import {
  BalanceResponse,
  ChatCompletion,
  DEFAULT_USAGE_DAYS,
  NonStreamingChatCompletionParams,
  UsageReport,
} from '../types';

/**
 * Options for creating an Orangic client.
 */
export interface OrangicClientOptions extends OrangicConfigOptions {
  /** Logger instance. */
  logger?: Logger;
  /** Custom transport (for testing). */
  transport?: HttpTransport;
}

/**
 * Main Orangic client.
 *
 * Construction fails with an AuthenticationError when no API key is passed
 * and ORANGIC_API_KEY is unset; nothing is sent over the network until an
 * operation is called.
 */
export class OrangicClient {
  /** Chat completions service. */
  readonly chat: ChatService;

  private readonly config: OrangicConfig;
  private readonly transport: HttpTransport;
  private readonly account: AccountService;
  private readonly logger: Logger;

  constructor(options: OrangicClientOptions = {}) {
    this.config = OrangicConfig.create(options);
    this.logger = options.logger ?? new NoopLogger();

    this.transport =
      options.transport ??
      new AxiosTransport(this.config, new BearerAuthProvider(this.config.apiKey), this.logger);

    this.chat = new DefaultChatService(this.transport, this.logger);
    this.account = new DefaultAccountService(this.transport);
  }

  /**
   * Gets the current balance for the API key.
   */
  getBalance(): Promise<BalanceResponse> {
    return this.account.getBalance();
  }

  /**
   * Gets the usage report for the last `daysBack` days.
   */
  getUsageReport(daysBack: number = DEFAULT_USAGE_DAYS): Promise<UsageReport> {
    return this.account.getUsageReport(daysBack);
  }

  /**
   * Runs an operation under a retry policy bounded by the configured
   * maxRetries. Only rate limits, 5xx responses and connection failures are
   * retried.
   *
   * @example
   * ```typescript
   * const balance = await client.withRetry(() => client.getBalance());
   * ```
   */
  withRetry<T>(fn: () => Promise<T>): Promise<T> {
    return new RetryPolicy({ maxRetries: this.config.maxRetries }, this.logger).execute(fn);
  }

  getConfig(): OrangicConfig {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Creates a new client builder.
   */
  static builder(): OrangicClientBuilder {
    return new OrangicClientBuilder();
  }

  /**
   * Creates a client from ORANGIC_* environment variables.
   */
  static fromEnv(): OrangicClient {
    return new OrangicClient(optionsFromEnv());
  }
}

/**
 * Builder for creating OrangicClient instances.
 */
export class OrangicClientBuilder {
  private readonly options: OrangicClientOptions = {};

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

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Enables console logging at the specified level.
   */
  withConsoleLogging(level: LogLevel = LogLevel.Info): this {
    this.options.logger = new ConsoleLogger({ level });
    return this;
  }

  /**
   * Sets a custom transport (for testing).
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  build(): OrangicClient {
    return new OrangicClient(this.options);
  }
}

/**
 * One-shot convenience: builds a client from `options` and runs a single
 * non-streaming completion.
 *
 * @example
 * ```typescript
 * const result = await completion({
 *   model: 'orangic-1',
 *   messages: [{ role: 'user', content: 'Hello' }],
 * });
 * console.log(result.content);
 * ```
 */
export function completion(
  params: NonStreamingChatCompletionParams,
  options: OrangicClientOptions = {}
): Promise<ChatCompletion> {
  return new OrangicClient(options).chat.completions.create(params);
}
