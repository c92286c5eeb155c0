/**
 * Orangic API Client Library
 *
 * A TypeScript client for the Orangic chat completion API, with streaming
 * responses, account balance and usage reports.
 *
 * @example
 * ```typescript
 * import { OrangicClient, userMessage } from 'orangic-sdk';
 *
 * const client = OrangicClient.builder()
 *   .apiKey('your-api-key')
 *   .build();
 *
 * const response = await client.chat.completions.create({
 *   model: 'orangic-1',
 *   messages: [userMessage('Hello, Orangic!')],
 * });
 * console.log(response.content);
 *
 * const stream = await client.chat.completions.create({
 *   model: 'orangic-1',
 *   messages: [userMessage('Tell me a story')],
 *   stream: true,
 * });
 * for await (const chunk of stream) {
 *   process.stdout.write(chunk.content);
 * }
 * ```
 */

// Client
export { OrangicClient, OrangicClientBuilder, completion } from './client';
export type { OrangicClientOptions } from './client';

// Config
export {
  OrangicConfig,
  OrangicConfigBuilder,
  optionsFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  API_KEY_ENV_VAR,
  USER_AGENT,
} from './config';
export type { OrangicConfigOptions } from './config';

// Errors
export {
  OrangicError,
  OrangicErrorKind,
  AuthenticationError,
  RateLimitError,
  ApiError,
  raiseForStatus,
  extractErrorMessage,
  isErrorStatus,
  isOrangicError,
  isRetryableError,
} from './errors';
export type { OrangicErrorDetails, ClassifiableResponse } from './errors';

// Types
export {
  Message,
  ChatCompletion,
  ChatCompletionChunk,
  systemMessage,
  userMessage,
  assistantMessage,
  toolMessage,
  DEFAULT_USAGE_DAYS,
} from './types';
export type {
  Role,
  MessageRecord,
  MessageInput,
  Reasoning,
  ExtraFields,
  ChatCompletionParams,
  StreamingChatCompletionParams,
  NonStreamingChatCompletionParams,
  ChatPayload,
  Choice,
  Usage,
  BalanceResponse,
  UsageReport,
} from './types';

// Services
export {
  ChatCompletionStream,
  DefaultChatService,
  DefaultChatCompletionsService,
  DefaultAccountService,
  CHAT_COMPLETIONS_PATH,
} from './services';
export type { ChatService, ChatCompletionsService, AccountService } from './services';

// Transport
export {
  AxiosTransport,
  buildChatPayload,
  decodeEventStream,
  splitLines,
} from './transport';
export type { HttpTransport, HttpRequest, HttpResponse, StreamingResponse } from './transport';

// Auth
export { BearerAuthProvider } from './auth';
export type { AuthProvider } from './auth';

// Resilience
export { RetryPolicy, DEFAULT_RETRY_CONFIG } from './resilience';
export type { RetryConfig } from './resilience';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
} from './observability';
export type { Logger, LogConfig, LogEntry, LogSink } from './observability';

// Mocks (for testing)
export {
  MockTransport,
  createMockTransport,
  jsonResponse,
  errorResponse,
  eventStreamResponse,
  mockChatCompletion,
} from './mocks';
export type { MockResponse, RecordedRequest, MockStreamState } from './mocks';

// Version
export { VERSION } from './version';
