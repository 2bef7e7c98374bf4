import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DEFAULT_ALLOWED_DOMAINS,
  DEFAULT_TRUSTED_ORIGINS,
  loadConfig,
} from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.security.allowedDomains).toEqual(DEFAULT_ALLOWED_DOMAINS);
    expect(config.security.trustedBridgeOrigins).toEqual(DEFAULT_TRUSTED_ORIGINS);
    expect(config.security.allowLocalContent).toBe(true);
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(18180);
  });

  it('parses comma-separated lists and lowercases them', () => {
    const config = loadConfig({
      HOSTBRIDGE_ALLOWED_DOMAINS: ' Example.com, docs.example.org ,',
      HOSTBRIDGE_TRUSTED_ORIGINS: 'example.com,file://',
    });
    expect(config.security.allowedDomains).toEqual(['example.com', 'docs.example.org']);
    expect(config.security.trustedBridgeOrigins).toEqual(['example.com', 'file://']);
  });

  it('parses the local content flag and port', () => {
    const config = loadConfig({
      HOSTBRIDGE_ALLOW_LOCAL_CONTENT: 'false',
      HOSTBRIDGE_PORT: '9000',
      HOSTBRIDGE_HOST: '0.0.0.0',
    });
    expect(config.security.allowLocalContent).toBe(false);
    expect(config.port).toBe(9000);
    expect(config.host).toBe('0.0.0.0');
  });

  it('returns a frozen configuration', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.security)).toBe(true);
    expect(Object.isFrozen(config.security.allowedDomains)).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ HOSTBRIDGE_ALLOW_LOCAL_CONTENT: 'yes' })).toThrow(ConfigError);
    expect(() => loadConfig({ HOSTBRIDGE_PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ HOSTBRIDGE_ALLOWED_DOMAINS: 'https://apple.com' })).toThrow(
      /HOSTBRIDGE_ALLOWED_DOMAINS: must be a bare host suffix/
    );
  });
});
