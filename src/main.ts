#!/usr/bin/env node
/**
 * Emulator entry point: read the environment, seed the default network and
 * serve the provider protocol on the configured port.
 */

import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext, seedDefaultNetwork } from './server';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const context = createAppContext(config);
  if (config.seedDefaultVpc) {
    await seedDefaultNetwork(context);
  }

  const app = createApp(context);
  app.listen(config.port, config.host, () => {
    logger.info('Emulator listening', {
      host: config.host,
      port: config.port,
      region: config.region,
      accountId: config.accountId,
    });
  });
}

main().catch((err: unknown) => {
  logger.error('Emulator failed to start', {
    message: err instanceof Error ? err.message : String(err),
  });
  process.exitCode = 1;
});
