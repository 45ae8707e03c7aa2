#!/usr/bin/env node

import { runCli } from './cli.js';
import { logger } from './utils/logger.js';

async function main() {
  const code = await runCli(process.argv.slice(2));
  process.exitCode = code;
}

main().catch((error: unknown) => {
  logger.cli.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
