/**
 * In-process stand-in for the chat-messages endpoint
 *
 * Replies are real node-fetch Response objects over in-memory streams, so the
 * client's HTTP and line-reading paths run unchanged. Each test queues the
 * replies it wants and inspects the request bodies afterwards.
 */

import { Readable } from 'stream';
import { RequestInit, Response } from 'node-fetch';
import { ChatMessagesRequest, FetchLike } from '../dify/client';
import { TextTranslator } from '../dispatch/fileTranslator';
import { TranslationOutput, emptyUsage } from '../core/types';
import { TranslationContext } from '../dify/translator';

export type MockReply =
  | { kind: 'stream'; lines: string[] }
  | { kind: 'blocking'; body: unknown }
  | { kind: 'status'; status: number; body: string };

export interface TurnOptions {
  conversationId?: string;
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  totalPrice?: string;
  currency?: string;
}

/**
 * Format one streamed record
 */
export function dataLine(record: unknown): string {
  return `data: ${JSON.stringify(record)}`;
}

function usageRecord(options: TurnOptions): Record<string, unknown> {
  const promptTokens = options.promptTokens ?? 10;
  const completionTokens = options.completionTokens ?? 5;
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: options.totalTokens ?? promptTokens + completionTokens,
    total_price: options.totalPrice ?? '0',
    currency: options.currency ?? 'USD',
  };
}

/**
 * A streamed turn: one message record per fragment, then message_end with usage
 */
export function streamTurn(fragments: string[], options: TurnOptions = {}): MockReply {
  const conversationId = options.conversationId ?? 'conv-1';
  const lines = fragments.map(answer =>
    dataLine({ event: 'message', answer, conversation_id: conversationId })
  );
  lines.push(
    dataLine({
      event: 'message_end',
      conversation_id: conversationId,
      metadata: { usage: usageRecord(options) },
    })
  );
  return { kind: 'stream', lines };
}

/**
 * A blocking reply carrying the whole answer
 */
export function blockingReply(answer: string, options: TurnOptions = {}): MockReply {
  return {
    kind: 'blocking',
    body: {
      event: 'message',
      answer,
      conversation_id: options.conversationId ?? 'conv-1',
      metadata: { usage: usageRecord(options) },
    },
  };
}

export class MockChatService {
  /** Request bodies in the order they were received */
  readonly calls: ChatMessagesRequest[] = [];
  /** Authorization headers in the order they were received */
  readonly authorizations: string[] = [];
  /** Bodies of streamed replies, to check they were read to the end */
  readonly bodies: Readable[] = [];
  private replies: MockReply[] = [];

  enqueue(...replies: MockReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  reset(): void {
    this.calls.length = 0;
    this.authorizations.length = 0;
    this.bodies.length = 0;
    this.replies = [];
  }

  readonly fetch: FetchLike = async (_url: string, init: RequestInit): Promise<Response> => {
    if (typeof init.body !== 'string') {
      throw new Error('MockChatService expects a JSON string body');
    }
    this.calls.push(JSON.parse(init.body));

    const headers = init.headers;
    if (headers && !Array.isArray(headers) && typeof headers === 'object' && 'Authorization' in headers) {
      this.authorizations.push(String(headers.Authorization));
    }

    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('MockChatService has no reply queued');
    }

    switch (reply.kind) {
      case 'stream': {
        const body = Readable.from(reply.lines.map(line => `${line}\n`));
        this.bodies.push(body);
        return new Response(body, { status: 200 });
      }
      case 'blocking':
        return new Response(JSON.stringify(reply.body), {
          status: 200,
          headers: { 'Content-Type': 'application/json' },
        });
      case 'status':
        return new Response(reply.body, { status: reply.status });
    }
  };
}

/**
 * Translator double for dispatch tests: prefixes the text with the target
 * language, and fails for any document containing "FAIL".
 */
export class FakeTranslator implements TextTranslator {
  /** Source texts in the order translate() was called */
  readonly seen: string[] = [];
  /** Label of the context each call received */
  readonly labels: Array<string | undefined> = [];

  async translate(text: string, targetLanguage: string, context?: TranslationContext): Promise<TranslationOutput> {
    this.seen.push(text);
    this.labels.push(context?.label);
    // Let other workers interleave
    await new Promise(resolve => setImmediate(resolve));

    if (text.includes('FAIL')) {
      throw new Error(`refused: ${text.trim()}`);
    }

    const usage = emptyUsage();
    usage.totalTokens = text.length;
    return {
      text: `[${targetLanguage}] ${text}`,
      metadata: { usage, durationMs: 0, turns: 1, conversationId: '' },
    };
  }
}
