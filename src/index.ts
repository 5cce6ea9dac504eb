#!/usr/bin/env node
/**
 * scan-relay - CLI entry point
 *
 * Reads newline-delimited scan codes from stdin (keyboard-wedge scanners
 * present as line input) and feeds each to ingestion while the delivery
 * worker and connectivity monitor run in the background.
 *
 * @module main
 */

import readline from 'node:readline';
import { createRelayContext, getRelayStatus, shutdownRelay, startRelay, type RelayContext } from './context';
import { loadConfig } from './services/config.service';
import { APP_NAME, APP_VERSION } from './utils/app-info';
import { ConfigValidationError, getErrorMessage } from './utils/errors';
import { createLogger, logger } from './utils/logger';

const log = createLogger('main');

process.on('uncaughtException', (err: NodeJS.ErrnoException) => {
  log.error('Uncaught exception', { error: err.message, code: err.code, stack: err.stack });
  process.exitCode = 1;
});

process.on('unhandledRejection', (reason: unknown) => {
  log.error('Unhandled rejection', { error: getErrorMessage(reason) });
});

function bootstrap(): RelayContext | null {
  try {
    const config = loadConfig();
    logger.setLevel(config.logLevel);
    log.info(`${APP_NAME} ${APP_VERSION} starting`, {
      databasePath: config.databasePath,
      sourceDeviceTag: config.sourceDeviceTag,
    });
    return createRelayContext(config);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      log.error('Configuration invalid', { issues: error.issues });
    } else {
      log.error('Startup failed', { error: getErrorMessage(error) });
    }
    return null;
  }
}

async function main(): Promise<void> {
  const context = bootstrap();
  if (!context) {
    process.exitCode = 1;
    return;
  }

  startRelay(context);

  const input = readline.createInterface({ input: process.stdin, terminal: false });
  let shuttingDown: Promise<void> | null = null;

  const shutdown = (signal: string): Promise<void> => {
    if (!shuttingDown) {
      log.info('Shutdown requested', { signal, status: getRelayStatus(context) });
      input.close();
      shuttingDown = shutdownRelay(context);
    }
    return shuttingDown;
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error('Shutdown failed', { error: getErrorMessage(err) });
        process.exitCode = 1;
      });
    });
  }

  // Lines are ingested one at a time so scans keep their order
  for await (const line of input) {
    const code = line.trim();
    if (!code) continue;

    const result = await context.ingestion.ingest(code);
    if (result.status === 'rejected') {
      log.warn('Scan rejected', { reason: result.reason, detail: result.detail });
    } else {
      log.info('Scan ingested', { ...result });
    }
  }

  await shutdown('stdin-closed');
}

main().catch((err: unknown) => {
  log.error('Fatal error', { error: getErrorMessage(err) });
  process.exitCode = 1;
});
