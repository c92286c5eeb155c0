/**
 * Type exports.
 */

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
} from './chat';
export {
  Message,
  ChatCompletion,
  ChatCompletionChunk,
  systemMessage,
  userMessage,
  assistantMessage,
  toolMessage,
} from './chat';

export type { BalanceResponse, UsageReport } from './account';
export { DEFAULT_USAGE_DAYS } from './account';
