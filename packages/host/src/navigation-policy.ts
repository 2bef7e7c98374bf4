/**
 * Navigation decisions for the content surface.
 *
 * Blocked navigations and load failures are reported to the store as
 * `errorOccurred` so the presentation layer can show them.
 */
import { LOCAL_CONTENT_SCHEME, formatBridgeError } from 'hostbridge-shared';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';
import type { SecurityGate } from './security-gate.js';
import type { BridgeStore } from './store.js';

/**
 * - `allow`: load in the content surface
 * - `cancel`: do not load
 * - `external`: do not load; hand the URL to the operating system
 */
export type NavigationDecision = 'allow' | 'cancel' | 'external';

const EXTERNAL_SCHEMES = new Set(['tel', 'mailto', 'sms']);

export class NavigationPolicy {
  private readonly logger: Logger;

  constructor(
    private readonly gate: SecurityGate,
    private readonly store: BridgeStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createConsoleLogger('Security');
  }

  /** Decide whether the surface may navigate to `target` */
  decideNavigation(target: string | URL | null | undefined): NavigationDecision {
    if (target === null || target === undefined) return 'cancel';

    let url: URL;
    try {
      url = target instanceof URL ? target : new URL(target);
    } catch {
      return 'cancel';
    }

    const scheme = url.protocol.slice(0, -1);
    if (scheme === LOCAL_CONTENT_SCHEME) {
      return this.gate.isLocalContentAllowed() ? 'allow' : 'cancel';
    }

    if (scheme === 'http' || scheme === 'https') {
      if (this.gate.isNavigationAllowed(url.hostname)) return 'allow';
      this.logger.warn(
        formatBridgeError('NAVIGATION_BLOCKED', `Blocked navigation to ${url.hostname || 'unknown'}`)
      );
      this.store.send({
        type: 'errorOccurred',
        message: `Domain is not allowed: ${url.hostname}`,
      });
      return 'cancel';
    }

    if (EXTERNAL_SCHEMES.has(scheme)) return 'external';
    return 'cancel';
  }

  /** Decide whether a loaded HTTP response may be shown */
  decideResponse(statusCode: number | undefined): 'allow' | 'cancel' {
    if (statusCode === undefined || statusCode < 400) return 'allow';
    this.logger.warn(formatBridgeError('TRANSPORT_FAILURE', `HTTP ${statusCode} response`));
    this.store.send({ type: 'errorOccurred', message: `HTTP ${statusCode} error occurred.` });
    return 'cancel';
  }

  /** Report a failed load */
  loadFailed(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error(formatBridgeError('TRANSPORT_FAILURE', 'Navigation failed'), err);
    this.store.send({ type: 'errorOccurred', message });
  }

  /** Report load progress in [0, 1] */
  progressChanged(progress: number): void {
    this.store.send({ type: 'progressUpdated', progress });
  }
}
