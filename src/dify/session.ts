/**
 * Translation Session
 *
 * Ephemeral state for one translate() call: the conversation to continue,
 * the text merged across turns, and the usage summed across turns.
 */

import { Usage, emptyUsage, addUsage } from '../core/types';

/** Characters of accumulated text searched for at the head of a continuation */
export const OVERLAP_WINDOW = 100;

/**
 * Append a continuation turn to previously accumulated text.
 *
 * Continuations often repeat the tail of the previous turn. The last
 * OVERLAP_WINDOW characters of `accumulated` are looked up literally in
 * `next`; when found, everything up to and including the first match is
 * dropped. Otherwise `next` is appended unchanged.
 */
export function mergeWithOverlap(accumulated: string, next: string): string {
  if (accumulated.length === 0) {
    return next;
  }

  const tail = accumulated.slice(-OVERLAP_WINDOW);
  const index = next.indexOf(tail);
  if (index === -1) {
    return accumulated + next;
  }

  return accumulated + next.slice(index + tail.length);
}

export class TranslationSession {
  private conversation = '';
  private text = '';
  private usage: Usage = emptyUsage();
  private turnCount = 0;
  private readonly startedAt: number;

  constructor(now: number = Date.now()) {
    this.startedAt = now;
  }

  get conversationId(): string {
    return this.conversation;
  }

  get accumulatedText(): string {
    return this.text;
  }

  get cumulativeUsage(): Usage {
    return { ...this.usage };
  }

  get turns(): number {
    return this.turnCount;
  }

  /** True once at least one turn has been recorded */
  get isContinuation(): boolean {
    return this.turnCount > 0;
  }

  /**
   * Record a finished turn: merge its text, add its usage, and remember the
   * conversation id for the next continuation.
   */
  completeTurn(turnText: string, usage: Usage | undefined, conversationId: string | undefined): void {
    this.text = this.turnCount === 0 ? turnText : mergeWithOverlap(this.text, turnText);
    if (usage) {
      this.usage = addUsage(this.usage, usage);
    }
    if (conversationId) {
      this.conversation = conversationId;
    }
    this.turnCount++;
  }

  elapsedMs(now: number = Date.now()): number {
    return now - this.startedAt;
  }
}
