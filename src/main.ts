#!/usr/bin/env node
/**
 * chart-reflect entry point.
 *
 * Usage:
 *   chart-reflect data/coffee_sales.csv "show quarterly revenue trend" -o out
 *   chart-reflect --cases cases.json --report out/report.json
 */

import { runApp } from './app.js';
import { formatError } from './errors/index.js';
import { logger } from './utilities/logger.js';

async function main(): Promise<void> {
  const controller = new AbortController();

  // First Ctrl+C stops dispatching and aborts in-flight calls; a second one exits
  const shutdownHandler = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('Shutdown requested. Cancelling in-flight requests...');
    controller.abort();
  };
  process.on('SIGINT', shutdownHandler);

  try {
    const { exitCode } = await runApp(process.argv.slice(2), { signal: controller.signal });
    process.exitCode = exitCode;
  } finally {
    process.removeListener('SIGINT', shutdownHandler);
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal: ${formatError(error)}\n`);
  process.exitCode = 1;
});
