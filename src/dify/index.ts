/**
 * Chat-messages translation client
 */

export {
  DifyTranslator,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MAX_TURNS,
  DEFAULT_QUERY,
  DEFAULT_CONTINUE_QUERY,
} from './translator';

export type { DifyTranslatorOptions, TranslationContext } from './translator';

export { DifyClient } from './client';
export type { DifyClientOptions, FetchLike, TurnRequest, TurnResult, ChatMessagesRequest } from './client';

export { TranslationSession, mergeWithOverlap, OVERLAP_WINDOW } from './session';

export {
  parseStreamLine,
  parseRecord,
  parseBlockingPayload,
  parseUsage,
  STREAM_LINE_PREFIX,
  TERMINAL_EVENT,
} from './stream';

export type { StreamEvent, BlockingReply } from './stream';
