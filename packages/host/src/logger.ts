/**
 * Diagnostic output for the host.
 *
 * Everything goes to stderr so stdout stays free for whatever embeds the host.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Logger writing `[HostBridge <scope>]`-prefixed lines to stderr */
export function createConsoleLogger(scope?: string): Logger {
  const prefix = scope ? `[HostBridge ${scope}]` : '[HostBridge]';
  return {
    info: (message) => console.error(`${prefix} ${message}`),
    warn: (message) => console.error(`${prefix} ${message}`),
    error: (message, err) =>
      err === undefined
        ? console.error(`${prefix} ${message}`)
        : console.error(`${prefix} ${message}:`, describe(err)),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
