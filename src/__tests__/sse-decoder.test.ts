/**
 * Tests for event-stream decoding.
 */

import { describe, it, expect, vi } from 'vitest';
import { decodeEventStream } from '../transport';
import { ChatCompletionChunk } from '../types';
import { Logger, NoopLogger } from '../observability';

function trackedLines(lines: string[]): { source: AsyncIterable<string>; read: () => number } {
  let count = 0;
  async function* source(): AsyncGenerator<string, void, undefined> {
    for (const line of lines) {
      count++;
      yield line;
    }
  }
  return { source: source(), read: () => count };
}

async function collect(lines: AsyncIterable<string>, logger?: Logger): Promise<ChatCompletionChunk[]> {
  const chunks: ChatCompletionChunk[] = [];
  for await (const chunk of decodeEventStream(lines, logger)) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('decodeEventStream', () => {
  it('should decode data events until [DONE]', async () => {
    const { source } = trackedLines([
      'data: {"content":"Hi"}',
      '',
      'data: {"content":" there","channel":"final"}',
      'data: [DONE]',
    ]);

    const chunks = await collect(source);

    expect(chunks.map((c) => c.content)).toEqual(['Hi', ' there']);
    expect(chunks.map((c) => c.channel)).toEqual(['final', 'final']);
  });

  it('should skip events that are not valid JSON', async () => {
    const { source } = trackedLines(['data: not-json', 'data: {"content":"x"}', 'data: [DONE]']);

    const chunks = await collect(source);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.content).toBe('x');
  });

  it('should skip events that are not JSON objects', async () => {
    const { source } = trackedLines(['data: 42', 'data: [1,2]', 'data: null', 'data: {"content":"ok"}']);

    const chunks = await collect(source);

    expect(chunks.map((c) => c.content)).toEqual(['ok']);
  });

  it('should log skipped events at debug level', async () => {
    const logger = new NoopLogger();
    const debug = vi.spyOn(logger, 'debug');
    const { source } = trackedLines(['data: not-json']);

    await collect(source, logger);

    expect(debug).toHaveBeenCalledWith('Skipping malformed stream event', { payload: 'not-json' });
  });

  it('should ignore lines without the data prefix', async () => {
    const { source } = trackedLines([
      ': keep-alive',
      'event: message',
      'data:{"content":"no space"}',
      'data: {"content":"kept"}',
    ]);

    const chunks = await collect(source);

    expect(chunks.map((c) => c.content)).toEqual(['kept']);
  });

  it('should not read past [DONE]', async () => {
    const tracked = trackedLines(['data: {"content":"a"}', 'data: [DONE]', 'data: {"content":"b"}']);

    const chunks = await collect(tracked.source);

    expect(chunks.map((c) => c.content)).toEqual(['a']);
    expect(tracked.read()).toBe(2);
  });

  it('should accept [DONE] surrounded by whitespace', async () => {
    const { source } = trackedLines(['data:  [DONE] ', 'data: {"content":"late"}']);

    expect(await collect(source)).toEqual([]);
  });

  it('should yield events whose fields are not strings', async () => {
    const { source } = trackedLines(['data: {"content":7}', 'data: {"content":"ok","channel":false}']);

    const chunks = await collect(source);

    expect(chunks.map((c) => c.content)).toEqual(['7', 'ok']);
    expect(chunks[1]?.channel).toBe('false');
  });

  it('should default missing content and channel', async () => {
    const { source } = trackedLines(['data: {"channel":"analysis"}', 'data: {"content":null}']);

    const chunks = await collect(source);

    expect(chunks[0]?.content).toBe('');
    expect(chunks[0]?.channel).toBe('analysis');
    expect(chunks[1]?.content).toBe('');
    expect(chunks[1]?.channel).toBe('final');
  });

  it('should end quietly when the body ends without [DONE]', async () => {
    const { source } = trackedLines(['data: {"content":"only"}']);

    const chunks = await collect(source);

    expect(chunks.map((c) => c.content)).toEqual(['only']);
  });

  it('should read lazily, one line per pull', async () => {
    const tracked = trackedLines(['data: {"content":"1"}', 'data: {"content":"2"}', 'data: {"content":"3"}']);
    const iterator = decodeEventStream(tracked.source);

    const first = await iterator.next();

    expect(first.done).toBe(false);
    expect(tracked.read()).toBe(1);
    await iterator.return(undefined);
  });
});
