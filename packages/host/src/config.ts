/**
 * Host configuration, read once at startup from the environment.
 *
 * The resulting object is frozen; there is no runtime reload.
 */
import { z } from 'zod';
import { SURFACE_DEFAULT_HOST, SURFACE_DEFAULT_PORT } from 'hostbridge-shared';

export interface SecurityConfig {
  /** Host suffixes pages may navigate to */
  readonly allowedDomains: readonly string[];
  /** Host suffixes (or `file://`) allowed to post bridge messages */
  readonly trustedBridgeOrigins: readonly string[];
  /** Whether local `file:` content may be loaded at all */
  readonly allowLocalContent: boolean;
}

export interface HostConfig {
  readonly security: SecurityConfig;
  readonly host: string;
  readonly port: number;
}

export const DEFAULT_ALLOWED_DOMAINS: readonly string[] = ['apple.com', 'google.com'];
export const DEFAULT_TRUSTED_ORIGINS: readonly string[] = ['file://', 'myservice.com'];

/** Environment variable names */
export const CONFIG_ENV = {
  allowedDomains: 'HOSTBRIDGE_ALLOWED_DOMAINS',
  trustedOrigins: 'HOSTBRIDGE_TRUSTED_ORIGINS',
  allowLocalContent: 'HOSTBRIDGE_ALLOW_LOCAL_CONTENT',
  host: 'HOSTBRIDGE_HOST',
  port: 'HOSTBRIDGE_PORT',
} as const;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const suffixListSchema = z.array(
  z.string().regex(/^[a-z0-9.-]+$/, 'must be a bare host suffix')
);
const originListSchema = z.array(
  z.union([z.literal('file://'), z.string().regex(/^[a-z0-9.-]+$/, 'must be a bare host suffix')])
);
const booleanSchema = z.enum(['true', 'false']).transform((value) => value === 'true');
const portSchema = z.coerce.number().int().min(0).max(65_535);

function parseCsv(raw: string | undefined, fallback: readonly string[]): string[] {
  if (raw === undefined || raw.trim() === '') return [...fallback];
  return raw
    .split(',')
    .map((x) => x.trim().toLowerCase())
    .filter(Boolean);
}

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, name: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`${name}: ${issue ? issue.message : 'invalid value'}`);
  }
  return result.data;
}

/** Freeze a security config, normalizing suffixes to lower case */
export function createSecurityConfig(input: {
  allowedDomains: readonly string[];
  trustedBridgeOrigins: readonly string[];
  allowLocalContent: boolean;
}): SecurityConfig {
  return Object.freeze({
    allowedDomains: Object.freeze(input.allowedDomains.map((d) => d.toLowerCase())),
    trustedBridgeOrigins: Object.freeze(input.trustedBridgeOrigins.map((d) => d.toLowerCase())),
    allowLocalContent: input.allowLocalContent,
  });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const allowedDomains = check(
    suffixListSchema,
    parseCsv(env[CONFIG_ENV.allowedDomains], DEFAULT_ALLOWED_DOMAINS),
    CONFIG_ENV.allowedDomains
  );
  const trustedBridgeOrigins = check(
    originListSchema,
    parseCsv(env[CONFIG_ENV.trustedOrigins], DEFAULT_TRUSTED_ORIGINS),
    CONFIG_ENV.trustedOrigins
  );
  const allowLocalContent = check(
    booleanSchema,
    env[CONFIG_ENV.allowLocalContent] ?? 'true',
    CONFIG_ENV.allowLocalContent
  );
  const port = check(
    portSchema,
    env[CONFIG_ENV.port] ?? SURFACE_DEFAULT_PORT,
    CONFIG_ENV.port
  );

  return Object.freeze({
    security: createSecurityConfig({ allowedDomains, trustedBridgeOrigins, allowLocalContent }),
    host: env[CONFIG_ENV.host] ?? SURFACE_DEFAULT_HOST,
    port,
  });
}
