/**
 * Server-sent event decoding for streamed completions.
 */

import { Logger, NoopLogger } from '../observability';
import { ChatCompletionChunk } from '../types/chat';

/** Prefix of every event line that carries data. */
export const DATA_PREFIX = 'data: ';

/** Payload that marks the end of the stream. */
export const DONE_SENTINEL = '[DONE]';

/**
 * Decodes event-stream lines into chunks, one line at a time.
 *
 * Non-data lines are ignored, `[DONE]` ends the sequence without reading
 * further, and events that are not a JSON chunk object are skipped.
 */
export async function* decodeEventStream(
  lines: AsyncIterable<string>,
  logger: Logger = new NoopLogger()
): AsyncGenerator<ChatCompletionChunk, void, undefined> {
  for await (const line of lines) {
    if (!line.startsWith(DATA_PREFIX)) {
      continue;
    }

    const payload = line.slice(DATA_PREFIX.length);
    if (payload.trim() === DONE_SENTINEL) {
      return;
    }

    const chunk = parseChunk(payload);
    if (!chunk) {
      logger.debug('Skipping malformed stream event', { payload });
      continue;
    }

    yield chunk;
  }
}

function parseChunk(payload: string): ChatCompletionChunk | undefined {
  let data: unknown;
  try {
    data = JSON.parse(payload);
  } catch {
    return undefined;
  }
  return ChatCompletionChunk.fromJSON(data);
}
