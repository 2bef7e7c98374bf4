/**
 * Host environment lookups used by getUserInfo and getAppVersion replies.
 */
import { readFileSync } from 'node:fs';
import { arch, machine, release, type, userInfo } from 'node:os';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

export interface HostEnvironment {
  userName(): Promise<string>;
  /** Human-readable device family, e.g. "Linux" */
  deviceModel(): Promise<string>;
  /** Hardware identifier, e.g. "x86_64" */
  deviceIdentifier(): Promise<string>;
  osVersion(): Promise<string>;
  appVersion(): Promise<string>;
}

const __dirname = dirname(fileURLToPath(import.meta.url));

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Environment backed by `node:os` and the host package's version */
export function createNodeEnvironment(options: { appVersion?: string } = {}): HostEnvironment {
  let version = options.appVersion;
  return {
    userName: async () => userInfo().username,
    deviceModel: async () => type(),
    deviceIdentifier: async () => machine() || arch(),
    osVersion: async () => release(),
    appVersion: async () => {
      version ??= readPackageVersion();
      return version;
    },
  };
}

/** Environment with fixed values */
export function createStaticEnvironment(values: {
  userName: string;
  deviceModel: string;
  deviceIdentifier: string;
  osVersion: string;
  appVersion: string;
}): HostEnvironment {
  return {
    userName: async () => values.userName,
    deviceModel: async () => values.deviceModel,
    deviceIdentifier: async () => values.deviceIdentifier,
    osVersion: async () => values.osVersion,
    appVersion: async () => values.appVersion,
  };
}
