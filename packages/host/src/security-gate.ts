/**
 * Security gate: navigation whitelist and bridge origin trust.
 *
 * Pure predicates over an immutable {@link SecurityConfig}; safe to share
 * between any number of sessions.
 */
import { LOCAL_CONTENT_ORIGIN, LOCAL_CONTENT_SCHEME } from 'hostbridge-shared';
import type { SecurityConfig } from './config.js';

/**
 * True when `host` equals one of the suffixes or is a dotted subdomain of one.
 * `notapple.com` does not match `apple.com`.
 */
export function matchesSuffix(host: string, suffixes: readonly string[]): boolean {
  const h = host.toLowerCase();
  return suffixes.some((suffix) => {
    const d = suffix.toLowerCase();
    return h === d || h.endsWith(`.${d}`);
  });
}

function toUrl(origin: string | URL): URL | null {
  if (origin instanceof URL) return origin;
  try {
    return new URL(origin);
  } catch {
    return null;
  }
}

export class SecurityGate {
  constructor(private readonly config: SecurityConfig) {}

  /** Whether a page may navigate to `host`. A missing host is never allowed. */
  isNavigationAllowed(host: string | null | undefined): boolean {
    if (host === null || host === undefined) return false;
    return matchesSuffix(host, this.config.allowedDomains);
  }

  /** Whether bridge messages from the frame at `origin` are accepted */
  isBridgeOriginTrusted(origin: string | URL | null | undefined): boolean {
    if (origin === null || origin === undefined) return false;
    const url = toUrl(origin);
    if (!url) return false;

    if (url.protocol === `${LOCAL_CONTENT_SCHEME}:`) {
      return this.config.trustedBridgeOrigins.includes(LOCAL_CONTENT_ORIGIN);
    }

    if (!url.hostname) return false;
    return matchesSuffix(
      url.hostname,
      this.config.trustedBridgeOrigins.filter((o) => o !== LOCAL_CONTENT_ORIGIN)
    );
  }

  /** Whether local `file:` content may be loaded */
  isLocalContentAllowed(): boolean {
    return this.config.allowLocalContent;
  }
}
