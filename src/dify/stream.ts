/**
 * Chat-messages wire format
 *
 * Streaming replies arrive as lines of the form `data: {json}`. Each record
 * is narrowed into a closed StreamEvent union so the turn loop can switch on
 * it exhaustively. Lines that are blank, lack the prefix, or do not hold a
 * JSON object are transport noise and parse to null.
 */

import { Usage } from '../core/types';

/** Literal prefix in front of every streamed record */
export const STREAM_LINE_PREFIX = 'data:';

/** Event name that ends a turn */
export const TERMINAL_EVENT = 'message_end';

export type StreamEvent =
  | { kind: 'message'; answer: string; conversationId?: string }
  | { kind: 'message_end'; conversationId?: string; usage?: Usage }
  | { kind: 'error'; message: string; code?: string; status?: number }
  | { kind: 'other'; event: string; conversationId?: string };

/** A blocking reply: the whole turn in one payload */
export type BlockingReply =
  | { kind: 'reply'; answer: string; conversationId?: string; usage?: Usage }
  | { kind: 'error'; message: string; code?: string; status?: number };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Read a numeric field that the service may send as a number or a decimal string
 */
function toNumber(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Extract usage from a record's `metadata.usage`, if present
 */
export function parseUsage(record: JsonObject): Usage | undefined {
  const metadata = record.metadata;
  if (!isObject(metadata) || !isObject(metadata.usage)) {
    return undefined;
  }

  const usage = metadata.usage;
  return {
    promptTokens: toNumber(usage.prompt_tokens),
    completionTokens: toNumber(usage.completion_tokens),
    totalTokens: toNumber(usage.total_tokens),
    promptPrice: toNumber(usage.prompt_price),
    completionPrice: toNumber(usage.completion_price),
    totalPrice: toNumber(usage.total_price),
    currency: optionalString(usage.currency) ?? null,
  };
}

/**
 * Build an error event if the record carries an error discriminator
 */
function parseError(record: JsonObject): { kind: 'error'; message: string; code?: string; status?: number } | null {
  if (record.event !== 'error' && !('error' in record)) {
    return null;
  }

  const nested = record.error;
  let message = optionalString(record.message);
  if (!message) {
    if (typeof nested === 'string') {
      message = nested;
    } else if (isObject(nested)) {
      message = optionalString(nested.message) ?? JSON.stringify(nested);
    }
  }

  return {
    kind: 'error',
    message: message ?? 'Unknown error',
    code: optionalString(record.code),
    status: typeof record.status === 'number' ? record.status : undefined,
  };
}

/**
 * Narrow one decoded JSON record into a StreamEvent
 */
export function parseRecord(value: unknown): StreamEvent | null {
  if (!isObject(value)) {
    return null;
  }

  const error = parseError(value);
  if (error) {
    return error;
  }

  const conversationId = optionalString(value.conversation_id);

  if (value.event === TERMINAL_EVENT) {
    return { kind: 'message_end', conversationId, usage: parseUsage(value) };
  }

  if (typeof value.answer === 'string') {
    return { kind: 'message', answer: value.answer, conversationId };
  }

  return {
    kind: 'other',
    event: typeof value.event === 'string' ? value.event : 'unknown',
    conversationId,
  };
}

/**
 * Parse one line of a streamed reply. Returns null for noise.
 */
export function parseStreamLine(line: string): StreamEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(STREAM_LINE_PREFIX)) {
    return null;
  }

  const body = trimmed.slice(STREAM_LINE_PREFIX.length).trim();
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    return null;
  }

  return parseRecord(decoded);
}

/**
 * Narrow the JSON body of a blocking reply
 */
export function parseBlockingPayload(value: unknown): BlockingReply {
  if (!isObject(value)) {
    return { kind: 'error', message: 'Blocking reply is not a JSON object' };
  }

  const error = parseError(value);
  if (error) {
    return error;
  }

  return {
    kind: 'reply',
    answer: typeof value.answer === 'string' ? value.answer : '',
    conversationId: optionalString(value.conversation_id),
    usage: parseUsage(value),
  };
}
