#!/usr/bin/env node

/**
 * Spine Scan Client - Entry Point
 *
 * Usage: scan-client [options] <image...>
 */

import { getConfig, parseArgs, printConfigInfo } from './config.js';
import { ScanCli } from './presentation/ScanCli.js';

async function main() {
  let cli: ScanCli | null = null;

  try {
    const config = getConfig();
    const { positionals: imagePaths } = parseArgs();

    printConfigInfo(config);

    cli = new ScanCli(config);
    const app = cli;
    console.error(`📱 Device: ${app.getDeviceId()}`);

    // Setup graceful shutdown
    const shutdown = (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down...`);
      app.printStats();
      app.shutdown();
      process.exit(130);
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await app.run(imagePaths);

    app.printStats();
    const leftOver = app.getOrchestrator().getStatus().queued;
    app.shutdown();
    process.exit(leftOver > 0 ? 2 : 0);
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (cli) {
      cli.shutdown();
    }

    process.exit(1);
  }
}

main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
