import { describe, it, expect } from 'vitest';
import {
  decodeRequest,
  parseFrame,
  decodePayload,
  successResponse,
  failureResponse,
  encodeResponse,
} from '../message.js';
import { greetingRequestSchema, openUrlRequestSchema } from '../schemas.js';

describe('decodeRequest', () => {
  it('decodes type, callback and data', () => {
    const result = decodeRequest({
      type: 'greeting',
      callback: 'cb',
      data: { text: 'Hello' },
    });
    expect(result).toEqual({
      ok: true,
      request: { type: 'greeting', callback: 'cb', data: { text: 'Hello' } },
    });
  });

  it('treats callback and data as optional', () => {
    const result = decodeRequest({ type: 'getUserInfo' });
    expect(result).toEqual({ ok: true, request: { type: 'getUserInfo' } });
  });

  it('reads a null callback as absent', () => {
    const result = decodeRequest({ type: 'showToast', callback: null, data: { message: 'hi' } });
    expect(result).toEqual({
      ok: true,
      request: { type: 'showToast', data: { message: 'hi' } },
    });
  });

  it('rejects unknown types and keeps the callback', () => {
    const result = decodeRequest({ type: 'bogus', callback: 'cb' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('UNKNOWN_TYPE');
    expect(result.error.callback).toBe('cb');
  });

  it('rejects a missing type', () => {
    const result = decodeRequest({ callback: 'cb' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('UNKNOWN_TYPE');
    expect(result.error.message).toBe('Unknown message type: undefined');
  });

  it('rejects non-objects without a callback', () => {
    for (const raw of [null, 'greeting', 42, ['greeting']]) {
      const result = decodeRequest(raw);
      expect(result).toEqual({
        ok: false,
        error: { code: 'NOT_AN_OBJECT', message: 'Envelope must be a JSON object' },
      });
    }
  });

  it('rejects a non-string callback', () => {
    const result = decodeRequest({ type: 'greeting', callback: 42 });
    expect(result).toEqual({
      ok: false,
      error: { code: 'INVALID_FIELD', message: 'Invalid field: callback' },
    });
  });
});

describe('parseFrame', () => {
  it('decodes a JSON frame', () => {
    const result = parseFrame('{"type":"showToast","data":{"message":"hi"}}');
    expect(result).toEqual({
      ok: true,
      request: { type: 'showToast', data: { message: 'hi' } },
    });
  });

  it('rejects invalid JSON', () => {
    expect(parseFrame('{not json')).toEqual({
      ok: false,
      error: { code: 'NOT_AN_OBJECT', message: 'Invalid JSON frame' },
    });
  });
});

describe('decodePayload', () => {
  it('returns the typed payload when it matches', () => {
    const payload = decodePayload(
      { type: 'greeting', data: { text: 'Hello', timestamp: '2026-02-07' } },
      greetingRequestSchema
    );
    expect(payload).toEqual({ text: 'Hello', timestamp: '2026-02-07' });
  });

  it('accepts a null timestamp', () => {
    expect(
      decodePayload({ type: 'greeting', data: { text: 'Hello', timestamp: null } }, greetingRequestSchema)
    ).toEqual({ text: 'Hello', timestamp: null });
  });

  it('returns undefined for absent or null payloads', () => {
    expect(decodePayload({ type: 'greeting' }, greetingRequestSchema)).toBeUndefined();
    expect(
      decodePayload({ type: 'greeting', data: null }, greetingRequestSchema)
    ).toBeUndefined();
  });

  it('returns undefined when the shape does not match', () => {
    expect(
      decodePayload({ type: 'greeting', data: { text: 5 } }, greetingRequestSchema)
    ).toBeUndefined();
    expect(
      decodePayload({ type: 'openUrl', data: { url: '' } }, openUrlRequestSchema)
    ).toBeUndefined();
  });
});

describe('encodeResponse', () => {
  it('sorts keys at every level', () => {
    const json = encodeResponse(
      successResponse('Loaded app version info.', {
        osVersion: '14.0',
        device: 'arm64',
        appVersion: '1.0.0',
      })
    );
    expect(json).toBe(
      '{"data":{"appVersion":"1.0.0","device":"arm64","osVersion":"14.0"},' +
        '"message":"Loaded app version info.","success":true}'
    );
  });

  it('omits data on success without data', () => {
    expect(encodeResponse(successResponse('Showing the toast.'))).toBe(
      '{"message":"Showing the toast.","success":true}'
    );
  });

  it('never carries data on failure', () => {
    const decoded: unknown = JSON.parse(encodeResponse(failureResponse('Invalid URL.')));
    expect(decoded).toEqual({ message: 'Invalid URL.', success: false });
    expect(decoded).not.toHaveProperty('data');
  });
});
