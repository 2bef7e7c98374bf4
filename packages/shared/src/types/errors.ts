/**
 * Error codes and descriptions for the bridge protocol.
 */

/** Standard error codes used across the bridge protocol */
export type BridgeErrorCode =
  | 'UNTRUSTED_ORIGIN'
  | 'MALFORMED_ENVELOPE'
  | 'MALFORMED_PAYLOAD'
  | 'INVALID_CALLBACK'
  | 'NAVIGATION_BLOCKED'
  | 'TRANSPORT_FAILURE';

/** Map of error codes to what happens to the offending message */
export const ERROR_DESCRIPTIONS: Record<BridgeErrorCode, string> = {
  UNTRUSTED_ORIGIN:
    'The message came from an origin outside the trusted set. It was dropped without a reply.',
  MALFORMED_ENVELOPE:
    'The message is not an object or its type is missing or unknown. A generic failure reply is sent when a callback can be extracted.',
  MALFORMED_PAYLOAD:
    'The payload does not match the shape required by the request type. A failure reply is sent.',
  INVALID_CALLBACK:
    'The callback name is not a plain dotted identifier. The reply was dropped.',
  NAVIGATION_BLOCKED:
    'The navigation target is not on the navigation whitelist. The navigation was cancelled.',
  TRANSPORT_FAILURE:
    'The page failed to load or answered with an HTTP error status.',
};

/** Prefix a log line with its error code, e.g. `INVALID_CALLBACK: ...` */
export function formatBridgeError(code: BridgeErrorCode, detail: string): string {
  return `${code}: ${detail}`;
}

/** Reasons an inbound envelope can fail to decode */
export type DecodeErrorCode = 'NOT_AN_OBJECT' | 'UNKNOWN_TYPE' | 'INVALID_FIELD';

/** Envelope decoding failure */
export interface DecodeError {
  code: DecodeErrorCode;
  message: string;
  /** Callback name recovered from the raw object, if it had a string one */
  callback?: string;
}
