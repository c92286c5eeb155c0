/**
 * HTTP transport layer for the Orangic client.
 */

import axios, { AxiosInstance, AxiosResponse, ResponseType } from 'axios';
import type { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { AuthProvider } from '../auth';
import { OrangicConfig } from '../config';
import { Logger, NoopLogger, toError } from '../observability';

/**
 * HTTP request options.
 */
export interface HttpRequest {
  /** HTTP method. */
  method: 'GET' | 'POST';
  /** URL path relative to the base URL. */
  path: string;
  /** JSON request body. */
  body?: unknown;
  /** Query string parameters. */
  query?: Record<string, string | number>;
  /** Request timeout override in milliseconds. */
  timeout?: number;
}

/**
 * Buffered HTTP response. The body is kept as text so that failed responses
 * can be classified before anything is decoded.
 */
export interface HttpResponse {
  /** HTTP status code. */
  status: number;
  /** Lower-cased response headers. */
  headers: Record<string, string>;
  /** Raw response body. */
  body: string;
  /** Request ID from headers. */
  requestId?: string;
}

/**
 * Open streaming response. The connection stays open until the lines are
 * exhausted or close() is called.
 */
export interface StreamingResponse {
  /** HTTP status code. */
  status: number;
  /** Lower-cased response headers. */
  headers: Record<string, string>;
  /** Request ID from headers. */
  requestId?: string;
  /** Body split into lines, without line terminators. Read lazily. */
  lines: AsyncIterable<string>;
  /** Reads the whole remaining body as text. */
  readBody(): Promise<string>;
  /** Releases the underlying connection. Safe to call more than once. */
  close(): void;
}

/**
 * HTTP transport interface.
 */
export interface HttpTransport {
  /**
   * Sends a request and buffers the response.
   */
  request(req: HttpRequest): Promise<HttpResponse>;

  /**
   * Sends a request and returns as soon as the response headers arrive.
   */
  stream(req: HttpRequest): Promise<StreamingResponse>;
}

/**
 * Default HTTP transport using axios. Connection and timeout failures are
 * axios errors and propagate unchanged.
 */
export class AxiosTransport implements HttpTransport {
  private readonly config: OrangicConfig;
  private readonly auth: AuthProvider;
  private readonly logger: Logger;
  private readonly client: AxiosInstance;

  constructor(
    config: OrangicConfig,
    auth: AuthProvider,
    logger: Logger = new NoopLogger(),
    client: AxiosInstance = axios.create()
  ) {
    this.config = config;
    this.auth = auth;
    this.logger = logger;
    this.client = client;
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const response = await this.send<string>(req, 'text');
    const headers = normalizeHeaders(response.headers);

    return {
      status: response.status,
      headers,
      body: typeof response.data === 'string' ? response.data : '',
      requestId: headers['x-request-id'],
    };
  }

  async stream(req: HttpRequest): Promise<StreamingResponse> {
    const response = await this.send<Readable>(req, 'stream', {
      Accept: 'text/event-stream',
    });
    const body = response.data;
    const headers = normalizeHeaders(response.headers);

    return {
      status: response.status,
      headers,
      requestId: headers['x-request-id'],
      lines: splitLines(body),
      readBody: () => readAll(body),
      close: () => {
        body.destroy();
      },
    };
  }

  /**
   * Builds the fixed request headers.
   */
  buildHeaders(): Record<string, string> {
    return {
      ...this.config.customHeaders,
      Authorization: this.auth.getAuthHeader(),
      'Content-Type': 'application/json',
      'User-Agent': this.config.userAgent,
    };
  }

  private async send<T>(
    req: HttpRequest,
    responseType: ResponseType,
    extraHeaders: Record<string, string> = {}
  ): Promise<AxiosResponse<T>> {
    const started = Date.now();
    const context = { method: req.method, path: req.path, apiKey: this.auth.getApiKeyHint() };
    this.logger.debug('Sending request', context);

    try {
      const response = await this.client.request<T>({
        method: req.method,
        baseURL: this.config.baseUrl,
        url: req.path,
        params: req.query,
        data: req.body,
        timeout: req.timeout ?? this.config.timeout,
        headers: { ...this.buildHeaders(), ...extraHeaders },
        responseType,
        validateStatus: () => true,
      });

      this.logger.debug('Received response', {
        ...context,
        status: response.status,
        durationMs: Date.now() - started,
      });
      return response;
    } catch (error) {
      this.logger.error('Request failed', toError(error), {
        ...context,
        durationMs: Date.now() - started,
      });
      throw error;
    }
  }
}

/**
 * Splits a byte or text stream into lines. Accepts both LF and CRLF
 * terminators; a trailing unterminated line is emitted at the end.
 */
export async function* splitLines(
  body: AsyncIterable<Buffer | string>
): AsyncGenerator<string, void, undefined> {
  const decoder = new StringDecoder('utf8');
  let buffer = '';

  for await (const chunk of body) {
    buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      yield stripCarriageReturn(line);
    }
  }

  buffer += decoder.end();
  if (buffer.length > 0) {
    yield stripCarriageReturn(buffer);
  }
}

async function readAll(body: AsyncIterable<Buffer | string>): Promise<string> {
  const decoder = new StringDecoder('utf8');
  let text = '';
  for await (const chunk of body) {
    text += typeof chunk === 'string' ? chunk : decoder.write(chunk);
  }
  return text + decoder.end();
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function normalizeHeaders(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'number') {
      result[key.toLowerCase()] = String(value);
    }
  }
  return result;
}
