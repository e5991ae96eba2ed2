#!/usr/bin/env node

/**
 * Chat Agent Gateway - Entry Point
 */

import { getConfig, printConfigInfo, Config } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { ChatGateway } from './presentation/ChatGateway.js';

function loadConfig(): Config {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('\nConfiguration Validation Failed!\n');
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
      console.error('\nCheck your .env file or environment variables.\n');
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  // Startup validation happens before anything binds a socket
  const config = loadConfig();
  printConfigInfo(config);

  const gateway = new ChatGateway(config);

  try {
    await gateway.start();
    gateway.printStats();
  } catch (error) {
    console.error('Fatal error during startup:', error);
    await gateway.shutdown();
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    try {
      await gateway.shutdown();
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
    void shutdown('UNHANDLED_REJECTION');
  });
}

main().catch((error) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
