/**
 * Inbound message decoding: base64 → UTF-8 → JSON
 *
 * Accepts a background-function event `{ data, messageId?, attributes? }`
 * or a push envelope `{ message: { data, messageId? } }`. The JSON payload
 * is one sales record or an array of them.
 */

import { TextDecoder } from 'util';
import { MessageDecodeError } from '../lib/error-handler';

export interface DecodedMessage {
  messageId: string | null;
  payload: string;
  records: unknown[];
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;
const utf8 = new TextDecoder('utf-8', { fatal: true });

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unwrapEnvelope(event: unknown): Record<string, unknown> {
  if (!isObject(event)) {
    throw new MessageDecodeError('Event is not an object');
  }
  return isObject(event.message) ? event.message : event;
}

export function decodeBase64Utf8(data: string): string {
  const compact = data.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new MessageDecodeError('Message data is not valid base64');
  }
  try {
    return utf8.decode(Buffer.from(compact, 'base64'));
  } catch (error) {
    throw new MessageDecodeError('Message data is not valid UTF-8', { cause: error });
  }
}

export function decodeSalesMessage(event: unknown): DecodedMessage {
  const message = unwrapEnvelope(event);
  const { data } = message;
  const messageId = typeof message.messageId === 'string' && message.messageId !== ''
    ? message.messageId
    : null;

  if (typeof data !== 'string' || data.trim() === '') {
    throw new MessageDecodeError('Message has no data');
  }

  const payload = decodeBase64Utf8(data);

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    throw new MessageDecodeError(`Message payload is not valid JSON: ${error instanceof Error ? error.message : error}`, { cause: error });
  }

  const records = Array.isArray(parsed) ? parsed : [parsed];
  if (records.length === 0) {
    throw new MessageDecodeError('Message payload contains no records');
  }

  return { messageId, payload, records };
}
