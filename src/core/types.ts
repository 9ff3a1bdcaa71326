/**
 * Token and cost accounting for one translation (summed across turns)
 */
export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  promptPrice: number;
  completionPrice: number;
  totalPrice: number;
  /** Carried through from the service; assumed uniform across turns */
  currency: string | null;
}

/**
 * Fresh zero usage. Every translation session starts from one of these.
 */
export function emptyUsage(): Usage {
  return {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    promptPrice: 0,
    completionPrice: 0,
    totalPrice: 0,
    currency: null,
  };
}

/**
 * Add one turn's usage into a running total
 */
export function addUsage(total: Usage, turn: Usage): Usage {
  return {
    promptTokens: total.promptTokens + turn.promptTokens,
    completionTokens: total.completionTokens + turn.completionTokens,
    totalTokens: total.totalTokens + turn.totalTokens,
    promptPrice: total.promptPrice + turn.promptPrice,
    completionPrice: total.completionPrice + turn.completionPrice,
    totalPrice: total.totalPrice + turn.totalPrice,
    currency: turn.currency ?? total.currency,
  };
}

/**
 * Ledger record for one successfully translated source file
 */
export interface FileRecord {
  /** Relative path with forward slashes */
  path: string;
  /** SHA-256 hex digest of the source bytes at last success */
  contentHash: string;
  /** ISO 8601 timestamp of last success */
  lastTranslated: string;
  /** Language the file was translated into */
  targetLanguage?: string;
  usage?: Usage;
}

export type ResponseMode = 'streaming' | 'blocking';

/**
 * Metadata returned alongside a finished translation
 */
export interface TranslationMetadata {
  usage: Usage;
  /** Wall-clock duration of the whole call, all turns included */
  durationMs: number;
  /** Number of request/response exchanges issued */
  turns: number;
  /** Conversation id of the last turn (empty when none was returned) */
  conversationId: string;
}

export interface TranslationOutput {
  text: string;
  metadata: TranslationMetadata;
}

/** Progress events emitted while a single file is being translated */
export type TranslationProgressEvent =
  | { type: 'turn-start'; turn: number; conversationId: string }
  | { type: 'chunk'; turn: number; chunks: number; characters: number }
  | { type: 'turn-end'; turn: number; completionTokens: number; truncated: boolean };

export type TranslationProgressCallback = (event: TranslationProgressEvent) => void;
