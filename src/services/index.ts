/**
 * Service exports.
 */

export type { ChatService, ChatCompletionsService } from './chat';
export {
  ChatCompletionStream,
  DefaultChatService,
  DefaultChatCompletionsService,
  CHAT_COMPLETIONS_PATH,
} from './chat';
export type { AccountService } from './account';
export { DefaultAccountService } from './account';
