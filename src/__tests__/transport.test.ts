/**
 * Tests for the axios transport. Requests are answered by an in-process
 * adapter, so nothing leaves the test process.
 */

import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'stream';
import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { AxiosTransport, splitLines } from '../transport';
import { BearerAuthProvider } from '../auth';
import { OrangicConfig } from '../config';
import { NoopLogger } from '../observability';
import { DefaultChatCompletionsService } from '../services/chat';
import { AuthenticationError } from '../errors';
import { ChatCompletionChunk } from '../types';

interface Reply {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

function createTransport(reply: Reply | Error, logger = new NoopLogger()) {
  const calls: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      calls.push(config);
      if (reply instanceof Error) {
        throw reply;
      }
      return {
        status: reply.status,
        statusText: '',
        headers: reply.headers ?? {},
        data: reply.data,
        config,
      };
    },
  });
  const config = OrangicConfig.create({
    apiKey: 'test-key',
    baseUrl: 'http://localhost:8080',
    timeout: 1234,
    customHeaders: { 'X-Custom': 'yes' },
  });
  const transport = new AxiosTransport(config, new BearerAuthProvider('test-key'), logger, client);
  return { transport, calls };
}

async function collectLines(source: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of source) {
    lines.push(line);
  }
  return lines;
}

describe('AxiosTransport', () => {
  describe('request', () => {
    it('should send the fixed headers and the JSON body', async () => {
      const { transport, calls } = createTransport({ status: 200, data: '{}' });

      await transport.request({ method: 'POST', path: '/v1/chat/completions', body: { model: 'm' } });

      const sent = calls[0];
      expect(sent?.method).toBe('post');
      expect(sent?.baseURL).toBe('http://localhost:8080');
      expect(sent?.url).toBe('/v1/chat/completions');
      expect(sent?.timeout).toBe(1234);
      expect(sent?.responseType).toBe('text');
      expect(sent?.data).toBe('{"model":"m"}');
      expect(sent?.headers.get('Authorization')).toBe('Bearer test-key');
      expect(sent?.headers.get('Content-Type')).toBe('application/json');
      expect(sent?.headers.get('User-Agent')).toBe('orangic-node/1.0.0');
      expect(sent?.headers.get('X-Custom')).toBe('yes');
    });

    it('should log requests with a hint of the API key', async () => {
      const logger = new NoopLogger();
      const debug = vi.spyOn(logger, 'debug');
      const { transport } = createTransport({ status: 200, data: '{}' }, logger);

      await transport.request({ method: 'GET', path: '/v1/balance' });

      expect(debug).toHaveBeenCalledWith('Sending request', {
        method: 'GET',
        path: '/v1/balance',
        apiKey: '...-key',
      });
    });

    it('should pass query parameters', async () => {
      const { transport, calls } = createTransport({ status: 200, data: '{}' });

      await transport.request({ method: 'GET', path: '/v1/report/usage', query: { days: 7 } });

      expect(calls[0]?.params).toEqual({ days: 7 });
      expect(calls[0]?.method).toBe('get');
    });

    it('should return error responses instead of throwing', async () => {
      const { transport } = createTransport({
        status: 500,
        data: 'upstream exploded',
        headers: { 'X-Request-Id': 'req-9' },
      });

      const response = await transport.request({ method: 'GET', path: '/v1/balance' });

      expect(response.status).toBe(500);
      expect(response.body).toBe('upstream exploded');
      expect(response.requestId).toBe('req-9');
      expect(response.headers['x-request-id']).toBe('req-9');
    });

    it('should propagate connection failures and log them', async () => {
      const logger = new NoopLogger();
      const error = vi.spyOn(logger, 'error');
      const failure = new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
      const { transport } = createTransport(failure, logger);

      await expect(transport.request({ method: 'GET', path: '/v1/balance' })).rejects.toBe(failure);
      expect(error).toHaveBeenCalledWith(
        'Request failed',
        failure,
        expect.objectContaining({ method: 'GET', path: '/v1/balance' })
      );
    });
  });

  describe('stream', () => {
    it('should ask for an event stream and split the body into lines', async () => {
      const body = Readable.from([
        Buffer.from('data: {"content":"H'),
        Buffer.from('i"}\r\n\r\ndata: [DONE]\n'),
      ]);
      const { transport, calls } = createTransport({ status: 200, data: body });

      const response = await transport.stream({ method: 'POST', path: '/v1/chat/completions', body: {} });

      expect(calls[0]?.responseType).toBe('stream');
      expect(calls[0]?.headers.get('Accept')).toBe('text/event-stream');
      expect(await collectLines(response.lines)).toEqual(['data: {"content":"Hi"}', '', 'data: [DONE]']);
    });

    it('should read the whole body of a failed stream', async () => {
      const body = Readable.from(['{"error":', '"bad key"}']);
      const { transport } = createTransport({ status: 401, data: body });

      const response = await transport.stream({ method: 'POST', path: '/v1/chat/completions' });

      expect(response.status).toBe(401);
      expect(await response.readBody()).toBe('{"error":"bad key"}');
    });

    it('should destroy the body on close', async () => {
      const body = Readable.from(['data: [DONE]\n']);
      const { transport } = createTransport({ status: 200, data: body });

      const response = await transport.stream({ method: 'POST', path: '/v1/chat/completions' });
      response.close();

      expect(body.destroyed).toBe(true);
    });

    it('should end a pending read when the stream is closed', async () => {
      const body = new Readable({ read() {} });
      body.push('data: {"content":"a"}\n');
      const { transport } = createTransport({ status: 200, data: body });
      const service = new DefaultChatCompletionsService(transport);

      const stream = await service.create({ model: 'm', messages: [], stream: true });
      const iterator = stream[Symbol.asyncIterator]();
      const first = await iterator.next();
      expect(first.value).toEqual(new ChatCompletionChunk('a'));
      const pending = iterator.next();

      await stream.close();

      expect(body.destroyed).toBe(true);
      expect(await pending).toEqual({ done: true, value: undefined });
    });

    it('should close the connection when a stream request is rejected', async () => {
      const body = Readable.from(['{"error":"bad key"}']);
      const { transport } = createTransport({ status: 401, data: body });
      const service = new DefaultChatCompletionsService(transport);

      await expect(service.create({ model: 'm', messages: [], stream: true })).rejects.toThrow(
        new AuthenticationError('bad key')
      );
      expect(body.destroyed).toBe(true);
    });
  });
});

describe('splitLines', () => {
  it('should join a multi-byte character split across chunks', async () => {
    const bytes = Buffer.from('héllo\nwörld');
    const lines = await collectLines(splitLines(Readable.from([bytes.subarray(0, 2), bytes.subarray(2)])));

    expect(lines).toEqual(['héllo', 'wörld']);
  });

  it('should emit nothing for an empty body', async () => {
    expect(await collectLines(splitLines(Readable.from([])))).toEqual([]);
  });
});
