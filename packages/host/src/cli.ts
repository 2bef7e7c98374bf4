#!/usr/bin/env node
/**
 * HostBridge CLI entry point.
 *
 * Usage:
 *   hostbridge          - Start the content surface server
 *   hostbridge --help   - Show usage information
 */
import { ERROR_DESCRIPTIONS } from 'hostbridge-shared';
import type { HostConfig } from './config.js';
import { CONFIG_ENV, ConfigError, loadConfig } from './config.js';
import { createNodeEnvironment } from './environment.js';
import { createConsoleLogger } from './logger.js';
import { attachConsolePresenter } from './presenter.js';
import { SecurityGate } from './security-gate.js';
import { SurfaceServer } from './surface-server.js';

const args = process.argv.slice(2);
const logger = createConsoleLogger();

if (args.includes('--help') || args.includes('-h')) {
  console.log(`hostbridge - bridge host for embedded web content

Usage:
  hostbridge              Start the content surface server
  hostbridge --help       Show this help message

Pages connect over WebSocket and post request envelopes
({ "type", "callback"?, "data"? }). Replies come back as callback frames.

Environment variables:
  ${CONFIG_ENV.allowedDomains}      Navigation whitelist (comma-separated)
  ${CONFIG_ENV.trustedOrigins}      Trusted bridge origins (comma-separated, "file://" for local content)
  ${CONFIG_ENV.allowLocalContent}  "true" or "false"
  ${CONFIG_ENV.host}                Bind address
  ${CONFIG_ENV.port}                WebSocket port

Error codes used in log lines and replies:
${Object.entries(ERROR_DESCRIPTIONS)
  .map(([code, description]) => `  ${code}\n      ${description}`)
  .join('\n')}`);
  process.exit(0);
} else {
  let config: HostConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', err);
      process.exit(1);
    }
    throw err;
  }

  let server: SurfaceServer;
  try {
    server = await SurfaceServer.create({
      gate: new SecurityGate(config.security),
      environment: createNodeEnvironment(),
      host: config.host,
      port: config.port,
      onSession: (session) => {
        attachConsolePresenter(session.store, logger);
      },
    });
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'EADDRINUSE') {
      logger.error(
        `Port ${config.port} is already in use.\n` +
          `  Use a different port:\n` +
          `    ${CONFIG_ENV.port}=${config.port + 1} hostbridge`
      );
    } else {
      logger.error('WebSocket server error', error);
    }
    process.exit(1);
  }
  logger.info(`Content surface server listening on ${config.host}:${server.port}`);

  const cleanup = async () => {
    logger.info('Shutting down...');
    await server.close();
    process.exit(0);
  };
  process.on('SIGTERM', cleanup);
  process.on('SIGINT', cleanup);
}
