/**
 * In-process transport double for tests.
 */

import {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingResponse,
} from '../transport';
import { DATA_PREFIX, DONE_SENTINEL } from '../transport/sse-decoder';

/**
 * Recorded request for verification.
 */
export interface RecordedRequest {
  /** Whether the request was made through stream(). */
  streaming: boolean;
  /** The request that was made. */
  request: HttpRequest;
}

/**
 * Mock response configuration.
 */
export interface MockResponse {
  /** HTTP status code. */
  status: number;
  /** Response headers. */
  headers?: Record<string, string>;
  /** Response body; for stream() this is what readBody() returns. */
  body?: string;
  /** Lines served by stream(). */
  lines?: string[];
  /** Error to throw instead of responding. */
  error?: Error;
}

/**
 * What happened to a stream served by the mock.
 */
export interface MockStreamState {
  /** Number of lines handed out so far. */
  linesRead: number;
  /** Whether close() was called. */
  closed: boolean;
}

/**
 * Mock transport with per-path response queues.
 */
export class MockTransport implements HttpTransport {
  private readonly responses: Map<string, MockResponse[]> = new Map();
  private readonly recordedRequests: RecordedRequest[] = [];
  private readonly streams: MockStreamState[] = [];

  /**
   * Queues a response for a path. The last queued response repeats once the
   * others are used up.
   */
  onPath(path: string, response: MockResponse): this {
    const existing = this.responses.get(path) ?? [];
    existing.push(response);
    this.responses.set(path, existing);
    return this;
  }

  getRecordedRequests(): RecordedRequest[] {
    return [...this.recordedRequests];
  }

  getLastRequest(): RecordedRequest | undefined {
    return this.recordedRequests[this.recordedRequests.length - 1];
  }

  /**
   * Returns the state of every stream opened so far, oldest first.
   */
  getStreams(): MockStreamState[] {
    return [...this.streams];
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push({ streaming: false, request: req });
    const response = this.nextResponse(req.path);

    return {
      status: response.status,
      headers: response.headers ?? {},
      body: response.body ?? '',
      requestId: 'mock-request-id',
    };
  }

  async stream(req: HttpRequest): Promise<StreamingResponse> {
    this.recordedRequests.push({ streaming: true, request: req });
    const response = this.nextResponse(req.path);

    const state: MockStreamState = { linesRead: 0, closed: false };
    this.streams.push(state);
    const lines = response.lines ?? [];

    async function* serve(): AsyncGenerator<string, void, undefined> {
      for (const line of lines) {
        if (state.closed) {
          return;
        }
        state.linesRead++;
        yield line;
      }
    }

    return {
      status: response.status,
      headers: response.headers ?? {},
      requestId: 'mock-request-id',
      lines: serve(),
      readBody: async () => response.body ?? lines.join('\n'),
      close: () => {
        state.closed = true;
      },
    };
  }

  private nextResponse(path: string): MockResponse {
    const queue = this.responses.get(path);
    const response = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!response) {
      throw new Error(`No mock response configured for ${path}`);
    }
    if (response.error) {
      throw response.error;
    }
    return response;
  }
}

export function createMockTransport(): MockTransport {
  return new MockTransport();
}

/**
 * Creates a JSON response mock.
 */
export function jsonResponse(data: unknown, status = 200): MockResponse {
  return { status, body: JSON.stringify(data) };
}

/**
 * Creates an error response mock with a flat `error` message.
 */
export function errorResponse(message: string, status = 500): MockResponse {
  return { status, body: JSON.stringify({ error: message }) };
}

/**
 * Creates an event-stream response mock. Each chunk becomes one `data:` line
 * and the stream ends with the `[DONE]` sentinel.
 */
export function eventStreamResponse(chunks: unknown[], status = 200): MockResponse {
  return {
    status,
    lines: [...chunks.map((chunk) => DATA_PREFIX + JSON.stringify(chunk)), DATA_PREFIX + DONE_SENTINEL],
  };
}

/**
 * Creates a mock chat completion body.
 */
export function mockChatCompletion(content: string, model = 'orangic-1'): Record<string, unknown> {
  return {
    id: 'chatcmpl-mock-123',
    object: 'chat.completion',
    created: 1700000000,
    model,
    content,
    finish_reason: 'stop',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
      },
    ],
    usage: {
      prompt_tokens: 10,
      completion_tokens: 20,
      total_tokens: 30,
    },
  };
}
