/**
 * Inbound frames are plain text, or a JSON object carrying the text under
 * `payload`, `text` or `content`. Replies mirror the format of the request.
 */

import { MalformedMessageError } from '../errors/gateway-errors';

export type MessageFormat = 'text' | 'json';

export interface DecodedMessage {
  text: string;
  format: MessageFormat;
}

export type OutboundEnvelope =
  | { type: 'response'; content: string; conversationId: string }
  | { type: 'error'; code: string; message: string };

const TEXT_FIELDS = ['payload', 'text', 'content'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeMessage(raw: string): DecodedMessage {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new MalformedMessageError('empty message');
  }

  if (!trimmed.startsWith('{')) {
    return { text: trimmed, format: 'text' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    throw new MalformedMessageError('invalid JSON envelope');
  }

  if (!isRecord(parsed)) {
    throw new MalformedMessageError('JSON envelope must be an object');
  }

  for (const field of TEXT_FIELDS) {
    const value = parsed[field];
    if (typeof value === 'string' && value.trim().length > 0) {
      return { text: value.trim(), format: 'json' };
    }
  }

  throw new MalformedMessageError(
    `JSON envelope needs a non-empty ${TEXT_FIELDS.join(', ')} field`,
  );
}

export function encodeResponse(
  text: string,
  format: MessageFormat,
  conversationId: string,
): string {
  if (format === 'text') {
    return text;
  }
  const envelope: OutboundEnvelope = { type: 'response', content: text, conversationId };
  return JSON.stringify(envelope);
}

export function encodeError(code: string, message: string): string {
  const envelope: OutboundEnvelope = { type: 'error', code, message };
  return JSON.stringify(envelope);
}
