import { DatastoreError } from '../errors.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * A value stored under a key. Structured values travel as JSON, scalars as
 * plain text, and `null` deletes the key.
 */
export type StoredValue = JsonValue;

export const JSON_CONTENT_TYPE = 'application/json';
export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

export interface EncodedBody {
  body: string;
  contentType: string;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Encode a value for a key write.
 *
 * Scalars are sent verbatim as text so that e.g. `"007"` is stored as `007`
 * rather than as a quoted JSON string.
 */
export function encodeValue(value: StoredValue): EncodedBody {
  if (value === null || typeof value === 'object') {
    return { body: JSON.stringify(value), contentType: JSON_CONTENT_TYPE };
  }
  return { body: String(value), contentType: TEXT_CONTENT_TYPE };
}

function tryParseJson(text: string): { ok: true; value: JsonValue } | { ok: false } {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Decode a response body: JSON when it parses, the raw text otherwise. An
 * empty body means the key holds no value.
 */
export function decodeBody(text: string): StoredValue {
  if (text.trim() === '') return null;
  const parsed = tryParseJson(text);
  return parsed.ok ? parsed.value : text;
}

const REQUEST_ID_FIELDS = ['requestId', 'request_id'] as const;

/**
 * Pull the request id out of a 202 body. Both `requestId` and `request_id`
 * are accepted; `requestId` wins when both are present.
 *
 * @throws DatastoreError when the body is not a JSON object or carries no
 *   usable id.
 */
export function extractRequestId(text: string): string {
  const parsed = tryParseJson(text);
  if (!parsed.ok || !isJsonObject(parsed.value)) {
    throw new DatastoreError('202 response missing valid JSON with requestId', { status: 202, body: text });
  }

  for (const field of REQUEST_ID_FIELDS) {
    const id = parsed.value[field];
    if (typeof id === 'string' && id.trim() !== '') {
      return id;
    }
  }
  throw new DatastoreError("202 response missing 'requestId' field", { status: 202, body: text });
}

/** Whether a decoded status body says the request is still pending. */
export function isPending(value: StoredValue): boolean {
  return isJsonObject(value) && value['status'] === 'pending';
}

/**
 * Percent-encode a path segment, leaving RFC 3986 `pchar` bytes as they are:
 * unreserved characters, sub-delimiters, ':' and '@'.
 */
export function encodePathSegment(segment: string): string {
  const bytes = Buffer.from(segment, 'utf8');
  let out = '';
  for (const b of bytes) {
    const ch = String.fromCharCode(b);
    if (
      (b >= 0x41 && b <= 0x5a) ||
      (b >= 0x61 && b <= 0x7a) ||
      (b >= 0x30 && b <= 0x39) ||
      "-._~!$&'()*+,;=:@".includes(ch)
    ) {
      out += ch;
    } else {
      out += '%' + b.toString(16).toUpperCase().padStart(2, '0');
    }
  }
  return out;
}
