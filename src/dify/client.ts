/**
 * Chat-Messages Client
 *
 * Sends one turn of a conversation to a Dify-style `chat-messages` endpoint
 * and collects the reply, either streamed line by line or as a single
 * blocking payload. Continuation across turns lives in DifyTranslator.
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import * as readline from 'readline';
import { ResponseMode, Usage } from '../core/types';
import { ConfigurationError, TranslationError } from '../core/errors';
import { errorMessage } from '../logging/logger';
import { parseBlockingPayload, parseStreamLine } from './stream';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface DifyClientOptions {
  apiUrl: string;
  apiKey: string;
  /** End-user identifier sent with every request */
  user: string;
  responseMode: ResponseMode;
  /** Override for tests; defaults to node-fetch */
  fetch?: FetchLike;
}

export interface TurnRequest {
  text: string;
  targetLanguage: string;
  query: string;
  /** Empty for the first turn of a conversation */
  conversationId: string;
}

export interface TurnResult {
  text: string;
  usage?: Usage;
  conversationId?: string;
}

/** Called after each streamed answer fragment */
export type ChunkCallback = (chunks: number, characters: number) => void;

/**
 * Request body of the chat-messages endpoint
 */
export interface ChatMessagesRequest {
  inputs: {
    target_language: string;
    input_content: string;
  };
  query: string;
  response_mode: ResponseMode;
  conversation_id: string;
  user: string;
}

export class DifyClient {
  private readonly options: DifyClientOptions;
  private readonly fetchImpl: FetchLike;

  constructor(options: DifyClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError(
        'API key must be provided either through --api-key or the DIFY_API_KEY environment variable'
      );
    }
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get responseMode(): ResponseMode {
    return this.options.responseMode;
  }

  buildRequest(turn: TurnRequest): ChatMessagesRequest {
    return {
      inputs: {
        target_language: turn.targetLanguage,
        input_content: turn.text,
      },
      query: turn.query,
      response_mode: this.options.responseMode,
      conversation_id: turn.conversationId,
      user: this.options.user,
    };
  }

  /**
   * Send one turn and collect its reply.
   * @throws TranslationError on HTTP failure or an error record
   */
  async sendTurn(turn: TurnRequest, onChunk?: ChunkCallback): Promise<TurnResult> {
    const response = await this.post(this.buildRequest(turn));

    if (this.options.responseMode === 'blocking') {
      return this.readBlocking(response);
    }
    return this.readStream(response, onChunk);
  }

  private async post(body: ChatMessagesRequest): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.apiUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new TranslationError(`Network error: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new TranslationError(
        `API request failed with status code ${response.status}: ${errorText}`,
        { status: response.status }
      );
    }

    return response;
  }

  private async readBlocking(response: Response): Promise<TurnResult> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TranslationError(`Invalid JSON in blocking reply: ${errorMessage(error)}`, { cause: error });
    }

    const reply = parseBlockingPayload(payload);
    if (reply.kind === 'error') {
      throw new TranslationError(`API error: ${reply.message}`, { status: reply.status });
    }

    return { text: reply.answer, usage: reply.usage, conversationId: reply.conversationId };
  }

  /**
   * Read a streamed turn until the terminal record or the end of the body.
   * Fragments are kept in arrival order.
   */
  private async readStream(response: Response, onChunk?: ChunkCallback): Promise<TurnResult> {
    const fragments: string[] = [];
    let characters = 0;
    let conversationId: string | undefined;

    const rl = readline.createInterface({
      input: response.body,
      crlfDelay: Infinity,
    });

    try {
      for await (const line of rl) {
        const event = parseStreamLine(line);
        if (!event) {
          continue;
        }

        switch (event.kind) {
          case 'message':
            fragments.push(event.answer);
            characters += event.answer.length;
            conversationId = event.conversationId ?? conversationId;
            onChunk?.(fragments.length, characters);
            break;
          case 'message_end':
            conversationId = event.conversationId ?? conversationId;
            return { text: fragments.join(''), usage: event.usage, conversationId };
          case 'error':
            throw new TranslationError(`API error: ${event.message}`, { status: event.status });
          case 'other':
            conversationId = event.conversationId ?? conversationId;
            break;
        }
      }
    } finally {
      rl.close();
      // Let the rest of the body flow so the connection is released
      response.body.resume();
    }

    // Body ended without a terminal record: a complete turn with no usage
    return { text: fragments.join(''), conversationId };
  }
}
