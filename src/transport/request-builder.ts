/**
 * Request payload construction for chat completions.
 */

import {
  ChatCompletionParams,
  ChatPayload,
  Message,
  MessageInput,
  MessageRecord,
} from '../types/chat';

/** Sampling defaults sent when the caller leaves them unset. */
export const DEFAULT_TEMPERATURE = 1.0;
export const DEFAULT_TOP_P = 1.0;
export const DEFAULT_FREQUENCY_PENALTY = 0.0;
export const DEFAULT_PRESENCE_PENALTY = 0.0;

/**
 * Converts a Message to its record form; records are returned as given.
 */
export function normalizeMessage(message: MessageInput): MessageRecord {
  return message instanceof Message ? message.toRecord() : message;
}

/**
 * Builds the JSON payload for the chat completions endpoint.
 *
 * Sampling parameters and `stream` are always present. `max_tokens`, `stop`
 * and `reasoning` appear only when set. Fields in `extra` are applied last
 * and replace anything of the same name, except `stream`, which always
 * follows the parameter.
 */
export function buildChatPayload(params: ChatCompletionParams): ChatPayload {
  const payload: ChatPayload = {
    model: params.model,
    messages: params.messages.map(normalizeMessage),
    temperature: params.temperature ?? DEFAULT_TEMPERATURE,
    top_p: params.top_p ?? DEFAULT_TOP_P,
    frequency_penalty: params.frequency_penalty ?? DEFAULT_FREQUENCY_PENALTY,
    presence_penalty: params.presence_penalty ?? DEFAULT_PRESENCE_PENALTY,
    stream: params.stream ?? false,
  };

  if (params.max_tokens !== undefined) {
    payload.max_tokens = params.max_tokens;
  }

  if (params.stop !== undefined) {
    payload.stop = params.stop;
  }

  if (params.reasoning !== undefined) {
    payload.reasoning = params.reasoning;
  }

  if (params.extra) {
    Object.assign(payload, params.extra);
    payload.stream = params.stream ?? false;
  }

  return payload;
}
