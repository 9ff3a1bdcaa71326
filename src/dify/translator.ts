/**
 * Streaming Translation Client
 *
 * Drives one logical translation as one or more turns against the
 * chat-messages endpoint:
 *
 *   SENDING -> STREAMING_TURN -> TURN_COMPLETE -> DONE
 *                                     |
 *                                 CONTINUING -> SENDING (same conversation)
 *
 * A turn whose completion tokens reach the per-turn output ceiling was cut
 * off, so the conversation is resumed with the continue query and the new
 * output is stitched on after overlap removal. Any failure aborts the whole
 * call; partial text is never returned.
 */

import { TranslationError } from '../core/errors';
import { TranslationOutput, TranslationProgressCallback } from '../core/types';
import { log } from '../logging/logger';
import { DifyClient, DifyClientOptions } from './client';
import { TranslationSession } from './session';

/** Default per-turn completion ceiling of the provider */
export const DEFAULT_MAX_OUTPUT_TOKENS = 4096;

/** Upper bound on turns for a single file */
export const DEFAULT_MAX_TURNS = 20;

export const DEFAULT_QUERY = 'Please translate.';
export const DEFAULT_CONTINUE_QUERY = 'Please continue.';

export interface DifyTranslatorOptions extends DifyClientOptions {
  query?: string;
  continueQuery?: string;
  maxOutputTokens?: number;
  maxTurns?: number;
}

/**
 * Per-call context supplied by the calling worker. Owned by that worker for
 * the duration of the call; the translator keeps no reference to it.
 */
export interface TranslationContext {
  /** Label used in log lines, e.g. "worker 2" */
  label?: string;
  onProgress?: TranslationProgressCallback;
}

export class DifyTranslator {
  private readonly client: DifyClient;
  private readonly query: string;
  private readonly continueQuery: string;
  private readonly maxOutputTokens: number;
  private readonly maxTurns: number;

  constructor(options: DifyTranslatorOptions) {
    this.client = new DifyClient(options);
    this.query = options.query ?? DEFAULT_QUERY;
    this.continueQuery = options.continueQuery ?? DEFAULT_CONTINUE_QUERY;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  }

  /**
   * Translate a document.
   *
   * @returns The merged text of every turn plus usage summed across turns
   * @throws TranslationError if any turn fails or nothing was received
   */
  async translate(
    text: string,
    targetLanguage: string,
    context: TranslationContext = {}
  ): Promise<TranslationOutput> {
    const session = new TranslationSession();
    const label = context.label ? `[${context.label}] ` : '';

    for (;;) {
      const turn = session.turns + 1;
      const continuing = session.isContinuation;
      context.onProgress?.({ type: 'turn-start', turn, conversationId: session.conversationId });

      const result = await this.client.sendTurn(
        {
          text,
          targetLanguage,
          query: continuing ? this.continueQuery : this.query,
          conversationId: continuing ? session.conversationId : '',
        },
        (chunks, characters) => context.onProgress?.({ type: 'chunk', turn, chunks, characters })
      );

      const completionTokens = result.usage?.completionTokens ?? 0;
      const truncated = completionTokens >= this.maxOutputTokens;
      session.completeTurn(result.text, result.usage, result.conversationId);
      context.onProgress?.({ type: 'turn-end', turn, completionTokens, truncated });

      if (!truncated) {
        break;
      }

      if (!session.conversationId) {
        throw new TranslationError('Reply was truncated but the service returned no conversation id');
      }
      if (session.turns >= this.maxTurns) {
        throw new TranslationError(`Reply still truncated after ${this.maxTurns} turns`);
      }

      log(`${label}Turn ${turn} hit the output ceiling (${completionTokens} tokens), continuing conversation ${session.conversationId}`);
    }

    const translated = session.accumulatedText;
    if (!translated) {
      throw new TranslationError('No translation received from API');
    }

    return {
      text: translated,
      metadata: {
        usage: session.cumulativeUsage,
        durationMs: session.elapsedMs(),
        turns: session.turns,
        conversationId: session.conversationId,
      },
    };
  }
}
