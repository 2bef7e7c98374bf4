/**
 * Inbound side of the bridge: origin check, envelope decoding and hand-off
 * to the store.
 */
import {
  GENERIC_FAILURE_MESSAGE,
  decodeRequest,
  parseFrame,
  failureResponse,
  formatBridgeError,
} from 'hostbridge-shared';
import type { DecodeResult } from 'hostbridge-shared';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';
import type { SecurityGate } from './security-gate.js';
import type { BridgeStore } from './store.js';
import { sendEffect } from './feature.js';

/**
 * - `dispatched`: decoded and handed to the reducer
 * - `rejected`: envelope could not be decoded
 * - `untrusted`: dropped because of its origin
 */
export type HandleOutcome = 'dispatched' | 'rejected' | 'untrusted';

export class BridgeHandler {
  private readonly logger: Logger;
  private readonly securityLogger: Logger;

  constructor(
    private readonly gate: SecurityGate,
    private readonly store: BridgeStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createConsoleLogger();
    this.securityLogger = logger ?? createConsoleLogger('Security');
  }

  /** Handle one message posted by the frame at `origin` */
  handleMessage(body: unknown, origin: string | URL | null | undefined): HandleOutcome {
    if (!this.isTrusted(origin)) return 'untrusted';
    return this.accept(decodeRequest(body));
  }

  /** Handle one JSON text frame received from `origin` */
  handleFrame(text: string, origin: string | URL | null | undefined): HandleOutcome {
    if (!this.isTrusted(origin)) return 'untrusted';
    return this.accept(parseFrame(text));
  }

  private isTrusted(origin: string | URL | null | undefined): boolean {
    if (this.gate.isBridgeOriginTrusted(origin)) return true;
    // Never log the body of an untrusted message.
    const source = origin === null || origin === undefined ? 'unknown' : String(origin);
    this.securityLogger.warn(
      formatBridgeError('UNTRUSTED_ORIGIN', `Blocked bridge call from untrusted origin: ${source}`)
    );
    return false;
  }

  private accept(result: DecodeResult): HandleOutcome {
    if (!result.ok) {
      this.logger.warn(
        formatBridgeError(
          'MALFORMED_ENVELOPE',
          `Rejected bridge message (${result.error.code}): ${result.error.message}`
        )
      );
      // Unknown types fail decoding as a whole, so reply through the raw callback.
      this.store.enqueue(sendEffect(result.error.callback, failureResponse(GENERIC_FAILURE_MESSAGE)));
      return 'rejected';
    }

    this.store.send({ type: 'bridgeMessageReceived', request: result.request });
    return 'dispatched';
  }
}
