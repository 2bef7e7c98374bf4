/**
 * Envelope codec: decoding inbound requests and encoding replies.
 */
import type { ZodType, ZodTypeDef } from 'zod';
import type {
  BridgeFailure,
  BridgeRequest,
  BridgeResponse,
  BridgeSuccess,
} from './types/bridge.js';
import type { DecodeError } from './types/errors.js';
import { bridgeMessageTypeSchema, bridgeRequestSchema } from './schemas.js';

/** Outcome of decoding an inbound envelope */
export type DecodeResult =
  | { ok: true; request: BridgeRequest }
  | { ok: false; error: DecodeError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeFailure(
  code: DecodeError['code'],
  message: string,
  raw?: Record<string, unknown>
): DecodeResult {
  const error: DecodeError = { code, message };
  if (raw && typeof raw.callback === 'string') error.callback = raw.callback;
  return { ok: false, error };
}

/**
 * Decode a raw value into a request envelope.
 * The payload is kept as-is; see {@link decodePayload}.
 */
export function decodeRequest(raw: unknown): DecodeResult {
  if (!isRecord(raw)) {
    return decodeFailure('NOT_AN_OBJECT', 'Envelope must be a JSON object');
  }

  if (!bridgeMessageTypeSchema.safeParse(raw.type).success) {
    return decodeFailure('UNKNOWN_TYPE', `Unknown message type: ${String(raw.type)}`, raw);
  }

  const parsed = bridgeRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join('.') || 'envelope';
    return decodeFailure('INVALID_FIELD', `Invalid field: ${field}`, raw);
  }

  const request: BridgeRequest = { type: parsed.data.type };
  if (typeof parsed.data.callback === 'string') request.callback = parsed.data.callback;
  if (parsed.data.data !== undefined) request.data = parsed.data.data;
  return { ok: true, request };
}

/** Parse a JSON text frame and decode it as a request envelope */
export function parseFrame(text: string): DecodeResult {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return decodeFailure('NOT_AN_OBJECT', 'Invalid JSON frame');
  }
  return decodeRequest(value);
}

/**
 * Decode the request payload against a schema.
 * Returns undefined when the payload is absent or does not match.
 */
export function decodePayload<T>(
  request: BridgeRequest,
  schema: ZodType<T, ZodTypeDef, unknown>
): T | undefined {
  if (request.data === undefined || request.data === null) return undefined;
  const result = schema.safeParse(request.data);
  return result.success ? result.data : undefined;
}

/** Create a successful reply */
export function successResponse<T = undefined>(
  message: string,
  data?: T
): BridgeSuccess<T> {
  const response: BridgeSuccess<T> = { success: true, message };
  if (data !== undefined) response.data = data;
  return response;
}

/** Create a failed reply */
export function failureResponse(message: string): BridgeFailure {
  return { success: false, message };
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(value[key]);
    }
    return out;
  }
  return value;
}

/** Encode a reply as JSON with keys sorted at every level */
export function encodeResponse<T>(response: BridgeResponse<T>): string {
  const envelope: Record<string, unknown> = {
    success: response.success,
    message: response.message,
  };
  if (response.success && response.data !== undefined) {
    envelope.data = response.data;
  }
  return JSON.stringify(sortKeys(envelope));
}
