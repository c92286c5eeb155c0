/**
 * Chat completion service.
 */

import { isErrorStatus, raiseForStatus } from '../errors';
import { Logger, NoopLogger } from '../observability';
import {
  HttpTransport,
  StreamingResponse,
  buildChatPayload,
  decodeEventStream,
  requestJson,
} from '../transport';
import {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionParams,
  ChatPayload,
  NonStreamingChatCompletionParams,
  StreamingChatCompletionParams,
} from '../types/chat';

/** Chat completions endpoint path. */
export const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';

/**
 * Single-pass stream of completion chunks.
 *
 * The stream owns the HTTP connection and releases it when iteration ends for
 * any reason: `[DONE]`, end of body, `break`, an exception in the loop body,
 * or close(). A stream that has been consumed yields nothing when iterated
 * again.
 */
export class ChatCompletionStream implements AsyncIterable<ChatCompletionChunk> {
  private readonly response: StreamingResponse;
  private readonly chunks: AsyncGenerator<ChatCompletionChunk, void, undefined>;
  private closed = false;

  constructor(response: StreamingResponse, logger: Logger = new NoopLogger()) {
    this.response = response;
    this.chunks = this.consume(logger);
  }

  /**
   * Returns the request ID.
   */
  get requestId(): string | undefined {
    return this.response.requestId;
  }

  [Symbol.asyncIterator](): AsyncIterator<ChatCompletionChunk> {
    return this.chunks;
  }

  /**
   * Stops the stream and releases the connection. The connection is released
   * first, so a read still waiting on the server ends instead of blocking
   * the close.
   */
  async close(): Promise<void> {
    this.closed = true;
    this.response.close();
    await this.chunks.return(undefined);
  }

  /**
   * Drains the stream and returns the concatenated content.
   */
  async collectContent(): Promise<string> {
    let content = '';
    for await (const chunk of this) {
      content += chunk.content;
    }
    return content;
  }

  private async *consume(
    logger: Logger
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    try {
      yield* decodeEventStream(this.response.lines, logger);
    } catch (error) {
      // A read torn down by close() ends the stream.
      if (!this.closed) {
        throw error;
      }
    } finally {
      this.response.close();
    }
  }
}

/**
 * Chat completions service interface.
 */
export interface ChatCompletionsService {
  /**
   * Creates a chat completion. Resolves to a stream when `stream` is true;
   * HTTP failures reject before any chunk is produced.
   */
  create(params: StreamingChatCompletionParams): Promise<ChatCompletionStream>;
  create(params: NonStreamingChatCompletionParams): Promise<ChatCompletion>;
  create(params: ChatCompletionParams): Promise<ChatCompletion | ChatCompletionStream>;
}

/**
 * Default chat completions implementation.
 */
export class DefaultChatCompletionsService implements ChatCompletionsService {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(transport: HttpTransport, logger: Logger = new NoopLogger()) {
    this.transport = transport;
    this.logger = logger;
  }

  create(params: StreamingChatCompletionParams): Promise<ChatCompletionStream>;
  create(params: NonStreamingChatCompletionParams): Promise<ChatCompletion>;
  create(params: ChatCompletionParams): Promise<ChatCompletion | ChatCompletionStream>;
  async create(params: ChatCompletionParams): Promise<ChatCompletion | ChatCompletionStream> {
    const payload = buildChatPayload(params);

    if (params.stream === true) {
      return this.openStream(payload);
    }

    const { response, data } = await requestJson(this.transport, {
      method: 'POST',
      path: CHAT_COMPLETIONS_PATH,
      body: payload,
    });
    return ChatCompletion.fromJSON(data, response.status);
  }

  private async openStream(payload: ChatPayload): Promise<ChatCompletionStream> {
    const response = await this.transport.stream({
      method: 'POST',
      path: CHAT_COMPLETIONS_PATH,
      body: payload,
    });

    if (isErrorStatus(response.status)) {
      try {
        raiseForStatus({
          status: response.status,
          headers: response.headers,
          requestId: response.requestId,
          body: await response.readBody(),
        });
      } finally {
        response.close();
      }
    }

    this.logger.debug('Stream opened', { model: payload.model, requestId: response.requestId });
    return new ChatCompletionStream(response, this.logger);
  }
}

/**
 * Chat API namespace.
 */
export interface ChatService {
  readonly completions: ChatCompletionsService;
}

/**
 * Default chat service implementation.
 */
export class DefaultChatService implements ChatService {
  readonly completions: ChatCompletionsService;

  constructor(transport: HttpTransport, logger?: Logger) {
    this.completions = new DefaultChatCompletionsService(transport, logger);
  }
}
