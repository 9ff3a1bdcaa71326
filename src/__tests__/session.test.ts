/**
 * Tests for TranslationSession and continuation overlap removal
 */

import { TranslationSession, mergeWithOverlap, OVERLAP_WINDOW } from '../dify/session';
import { Usage } from '../core/types';

const usage = (completionTokens: number, totalTokens: number, totalPrice = 0): Usage => ({
  promptTokens: totalTokens - completionTokens,
  completionTokens,
  totalTokens,
  promptPrice: 0,
  completionPrice: 0,
  totalPrice,
  currency: 'USD',
});

describe('mergeWithOverlap', () => {
  it('should not duplicate text repeated at the head of a continuation', () => {
    expect(mergeWithOverlap('the quick brown fox', 'the quick brown fox jumps')).toBe('the quick brown fox jumps');
  });

  it('should only search for the last 100 characters of long text', () => {
    const previous = 'Intro paragraph. '.repeat(10) + 'and at last the quick brown fox';
    const tail = previous.slice(-OVERLAP_WINDOW);
    const continuation = tail + ' jumps over the lazy dog.';

    expect(mergeWithOverlap(previous, continuation)).toBe(previous + ' jumps over the lazy dog.');
  });

  it('should drop everything up to the first match', () => {
    expect(mergeWithOverlap('abc', 'preamble abc rest abc')).toBe('abc rest abc');
  });

  it('should append unmodified when the tail is not found', () => {
    expect(mergeWithOverlap('first part.', ' second part.')).toBe('first part. second part.');
  });

  it('should append unmodified when only part of the tail is repeated', () => {
    expect(mergeWithOverlap('one two three', 'two three four')).toBe('one two threetwo three four');
  });

  it('should return the continuation when nothing was accumulated yet', () => {
    expect(mergeWithOverlap('', 'start')).toBe('start');
  });
});

describe('TranslationSession', () => {
  it('should start empty with fresh usage', () => {
    const session = new TranslationSession();

    expect(session.conversationId).toBe('');
    expect(session.accumulatedText).toBe('');
    expect(session.turns).toBe(0);
    expect(session.isContinuation).toBe(false);
    expect(session.cumulativeUsage.totalTokens).toBe(0);
    expect(session.cumulativeUsage.currency).toBeNull();
  });

  it('should not apply overlap removal to the first turn', () => {
    const session = new TranslationSession();
    session.completeTurn('text text', undefined, undefined);

    expect(session.accumulatedText).toBe('text text');
  });

  it('should merge turns and sum usage', () => {
    const session = new TranslationSession();
    session.completeTurn('Hello wor', usage(4, 10, 0.5), 'c-1');
    session.completeTurn('Hello world!', usage(2, 7, 0.25), 'c-1');

    expect(session.accumulatedText).toBe('Hello world!');
    expect(session.turns).toBe(2);
    expect(session.conversationId).toBe('c-1');
    expect(session.cumulativeUsage).toEqual({
      promptTokens: 11,
      completionTokens: 6,
      totalTokens: 17,
      promptPrice: 0,
      completionPrice: 0,
      totalPrice: 0.75,
      currency: 'USD',
    });
  });

  it('should keep the previous conversation id when a turn returns none', () => {
    const session = new TranslationSession();
    session.completeTurn('a', undefined, 'c-7');
    session.completeTurn('b', undefined, undefined);

    expect(session.conversationId).toBe('c-7');
  });

  it('should report elapsed time from its start', () => {
    const session = new TranslationSession(1_000);

    expect(session.elapsedMs(1_250)).toBe(250);
  });
});
