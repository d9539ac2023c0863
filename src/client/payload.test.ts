import { describe, it, expect } from 'vitest';

import { DatastoreError } from '../errors.js';
import {
  decodeBody,
  encodePathSegment,
  encodeValue,
  extractRequestId,
  isJsonObject,
  isPending,
  JSON_CONTENT_TYPE,
  TEXT_CONTENT_TYPE,
} from './payload.js';

describe('encodeValue', () => {
  it('sends objects as JSON', () => {
    expect(encodeValue({ Balance: 42 })).toEqual({ body: '{"Balance":42}', contentType: JSON_CONTENT_TYPE });
  });

  it('sends arrays as JSON', () => {
    expect(encodeValue(['a', 'b'])).toEqual({ body: '["a","b"]', contentType: JSON_CONTENT_TYPE });
  });

  it('sends null as a JSON null body', () => {
    expect(encodeValue(null)).toEqual({ body: 'null', contentType: JSON_CONTENT_TYPE });
  });

  it('sends strings verbatim as text', () => {
    expect(encodeValue('007')).toEqual({ body: '007', contentType: TEXT_CONTENT_TYPE });
  });

  it('does not quote strings that look like JSON', () => {
    expect(encodeValue('"quoted"').body).toBe('"quoted"');
  });

  it('sends numbers and booleans as text', () => {
    expect(encodeValue(12.5)).toEqual({ body: '12.5', contentType: TEXT_CONTENT_TYPE });
    expect(encodeValue(true)).toEqual({ body: 'true', contentType: TEXT_CONTENT_TYPE });
  });
});

describe('decodeBody', () => {
  it('parses JSON objects', () => {
    expect(decodeBody('{"a":[1,2]}')).toEqual({ a: [1, 2] });
  });

  it('parses JSON scalars', () => {
    expect(decodeBody('42')).toBe(42);
    expect(decodeBody('"hi"')).toBe('hi');
    expect(decodeBody('null')).toBeNull();
  });

  it('returns raw text when the body is not JSON', () => {
    expect(decodeBody('hello world')).toBe('hello world');
  });

  it('treats an empty body as no value', () => {
    expect(decodeBody('')).toBeNull();
    expect(decodeBody(' \n')).toBeNull();
  });
});

describe('extractRequestId', () => {
  it('reads requestId', () => {
    expect(extractRequestId('{"requestId":"abc"}')).toBe('abc');
  });

  it('reads request_id', () => {
    expect(extractRequestId('{"request_id":"def"}')).toBe('def');
  });

  it('prefers requestId when both are present', () => {
    expect(extractRequestId('{"request_id":"def","requestId":"abc"}')).toBe('abc');
  });

  it('falls back to request_id when requestId is blank', () => {
    expect(extractRequestId('{"requestId":"","request_id":"def"}')).toBe('def');
  });

  it('rejects a body without an id', () => {
    expect(() => extractRequestId('{"status":"queued"}')).toThrow("202 response missing 'requestId' field");
  });

  it('rejects a non-string id', () => {
    expect(() => extractRequestId('{"requestId":17}')).toThrow("202 response missing 'requestId' field");
  });

  it('rejects non-JSON bodies', () => {
    expect(() => extractRequestId('accepted')).toThrow('202 response missing valid JSON with requestId');
  });

  it('rejects JSON that is not an object', () => {
    expect(() => extractRequestId('["abc"]')).toThrow('202 response missing valid JSON with requestId');
  });

  it('attaches status and body to the error', () => {
    let caught: unknown;
    try {
      extractRequestId('{}');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(DatastoreError);
    if (caught instanceof DatastoreError) {
      expect(caught.status).toBe(202);
      expect(caught.body).toBe('{}');
    }
  });
});

describe('isPending', () => {
  it('matches status "pending"', () => {
    expect(isPending({ status: 'pending' })).toBe(true);
  });

  it('is case-sensitive', () => {
    expect(isPending({ status: 'Pending' })).toBe(false);
    expect(isPending({ Status: 'pending' })).toBe(false);
  });

  it('treats other values as resolved', () => {
    expect(isPending({ status: 'done' })).toBe(false);
    expect(isPending('pending')).toBe(false);
    expect(isPending(null)).toBe(false);
    expect(isPending(['pending'])).toBe(false);
  });
});

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});

describe('encodePathSegment', () => {
  it('leaves unreserved characters alone', () => {
    expect(encodePathSegment('Abc-123_x.y~z')).toBe('Abc-123_x.y~z');
  });

  it('keeps ":" and "@"', () => {
    expect(encodePathSegment('leaderboard:weekly@v2')).toBe('leaderboard:weekly@v2');
  });

  it('escapes path separators and query characters', () => {
    expect(encodePathSegment('a/b?c#d')).toBe('a%2Fb%3Fc%23d');
  });

  it('escapes spaces and percent signs', () => {
    expect(encodePathSegment('50% off')).toBe('50%25%20off');
  });

  it('escapes multi-byte characters byte by byte', () => {
    expect(encodePathSegment('é')).toBe('%C3%A9');
  });
});
