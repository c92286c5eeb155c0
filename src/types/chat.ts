/**
 * Chat completion types for the Orangic API.
 */

import { z } from 'zod';
import { ApiError } from '../errors';

/**
 * Message roles.
 */
export type Role = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Message in its wire form. Raw records are sent exactly as given, so any
 * extra fields survive.
 */
export interface MessageRecord {
  /** Message role. */
  role: Role;
  /** Message content. */
  content: string;
  [key: string]: unknown;
}

/**
 * Immutable chat message.
 */
export class Message {
  constructor(
    readonly role: Role,
    readonly content: string
  ) {
    Object.freeze(this);
  }

  /**
   * Converts to the plain record sent on the wire.
   */
  toRecord(): MessageRecord {
    return { role: this.role, content: this.content };
  }
}

/**
 * Anything accepted as a conversation turn.
 */
export type MessageInput = Message | MessageRecord;

/**
 * Reasoning setting: an effort level or a token budget.
 */
export type Reasoning = string | number;

/**
 * Extra payload fields. Streaming is chosen by the `stream` parameter only.
 */
export interface ExtraFields {
  stream?: never;
  [key: string]: unknown;
}

/**
 * Parameters for a chat completion.
 */
export interface ChatCompletionParams {
  /** Model ID to use. */
  model: string;
  /** Conversation so far, oldest first. */
  messages: ReadonlyArray<MessageInput>;
  /** Sampling temperature. Defaults to 1. */
  temperature?: number;
  /** Maximum tokens to generate. Omitted from the payload unless set. */
  max_tokens?: number;
  /** Nucleus sampling parameter. Defaults to 1. */
  top_p?: number;
  /** Frequency penalty. Defaults to 0. */
  frequency_penalty?: number;
  /** Presence penalty. Defaults to 0. */
  presence_penalty?: number;
  /** Stop sequence(s). Omitted from the payload unless set. */
  stop?: string | string[];
  /** Whether to stream the response. */
  stream?: boolean;
  /** Reasoning effort or budget. Omitted from the payload unless set. */
  reasoning?: Reasoning;
  /**
   * Extra fields copied into the payload as-is. They are merged last and
   * replace any field of the same name except `stream`.
   */
  extra?: ExtraFields;
}

/**
 * Parameters for a streaming chat completion.
 */
export type StreamingChatCompletionParams = ChatCompletionParams & { stream: true };

/**
 * Parameters for a non-streaming chat completion.
 */
export type NonStreamingChatCompletionParams = ChatCompletionParams & { stream?: false };

/**
 * JSON body sent to the chat completions endpoint.
 */
export interface ChatPayload {
  model: string;
  messages: MessageRecord[];
  temperature: number;
  top_p: number;
  frequency_penalty: number;
  presence_penalty: number;
  stream: boolean;
  max_tokens?: number;
  stop?: string | string[];
  reasoning?: Reasoning;
  [key: string]: unknown;
}

/**
 * Renders a loosely typed scalar field as text. Missing and null values take
 * the fallback; non-string values are JSON-encoded.
 */
function asText(value: unknown, fallback: string): string {
  if (value === null || value === undefined) {
    return fallback;
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

const textField = (fallback: string) => z.unknown().transform((v) => asText(v, fallback));

const nullableTextField = z
  .unknown()
  .transform((v) => (v === null || v === undefined ? null : asText(v, '')));

const choiceSchema = z
  .object({
    index: z.number().int().nullish().catch(null),
    message: z.record(z.unknown()).nullish().catch(null),
    finish_reason: nullableTextField,
  })
  .passthrough();

/**
 * Choice in a chat completion response. `index` falls back to the choice's
 * position when the server leaves it out.
 */
export interface Choice {
  index: number;
  message: Record<string, unknown>;
  finish_reason: string | null;
  [key: string]: unknown;
}

/**
 * Token usage statistics.
 */
export type Usage = Record<string, unknown>;

const chatCompletionSchema = z.object({
  id: textField(''),
  object: textField('chat.completion'),
  created: z.number().nullish().catch(null).transform((v) => v ?? 0),
  model: textField(''),
  content: textField(''),
  finish_reason: nullableTextField,
  tool_calls: z.array(z.record(z.unknown())).nullish().catch(null).transform((v) => v ?? null),
  choices: z
    .array(choiceSchema)
    .nullish()
    .transform((v) =>
      (v ?? []).map(
        (choice, position): Choice => ({
          ...choice,
          index: choice.index ?? position,
          message: choice.message ?? {},
          finish_reason: choice.finish_reason,
        })
      )
    ),
  usage: z.record(z.unknown()).nullish().catch(null).transform((v) => v ?? {}),
});

/**
 * Chat completion response. Choices keep the order the server sent them in.
 */
export class ChatCompletion {
  readonly id: string;
  readonly object: string;
  /** Unix timestamp of creation. */
  readonly created: number;
  readonly model: string;
  readonly choices: readonly Choice[];
  readonly usage: Usage;
  /** Flattened assistant reply, when the server sends one. */
  readonly content: string;
  readonly finishReason: string | null;
  readonly toolCalls: ReadonlyArray<Record<string, unknown>> | null;

  private constructor(data: z.output<typeof chatCompletionSchema>) {
    this.id = data.id;
    this.object = data.object;
    this.created = data.created;
    this.model = data.model;
    this.choices = data.choices;
    this.usage = data.usage;
    this.content = data.content;
    this.finishReason = data.finish_reason;
    this.toolCalls = data.tool_calls;
    Object.freeze(this);
  }

  /**
   * Builds a completion from a decoded JSON response body.
   */
  static fromJSON(data: unknown, statusCode?: number): ChatCompletion {
    const result = chatCompletionSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ApiError(`Unexpected chat completion response: ${issues.join(', ')}`, {
        statusCode,
      });
    }
    return new ChatCompletion(result.data);
  }
}

const chunkSchema = z.object({
  content: textField(''),
  channel: textField('final'),
});

/**
 * One streamed fragment of a completion.
 */
export class ChatCompletionChunk {
  constructor(
    /** Content fragment. */
    readonly content: string,
    /** Output channel, e.g. "final" or "analysis". */
    readonly channel: string = 'final'
  ) {
    Object.freeze(this);
  }

  /**
   * Builds a chunk from a decoded event, or returns undefined when the event
   * does not have the chunk shape.
   */
  static fromJSON(data: unknown): ChatCompletionChunk | undefined {
    const result = chunkSchema.safeParse(data);
    if (!result.success) {
      return undefined;
    }
    return new ChatCompletionChunk(result.data.content, result.data.channel);
  }
}

/**
 * Creates a system message.
 */
export function systemMessage(content: string): Message {
  return new Message('system', content);
}

/**
 * Creates a user message.
 */
export function userMessage(content: string): Message {
  return new Message('user', content);
}

/**
 * Creates an assistant message.
 */
export function assistantMessage(content: string): Message {
  return new Message('assistant', content);
}

/**
 * Creates a tool result message.
 */
export function toolMessage(content: string): Message {
  return new Message('tool', content);
}
