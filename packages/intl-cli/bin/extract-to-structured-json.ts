#!/usr/bin/env npx tsx
/**
 * Extract Intl messages from source files into a structured JSON file.
 *
 * Usage: npx tsx bin/extract-to-structured-json.ts [options] [files...]
 */

import { logger } from '@structured-intl/message-core';

import { mainExtract } from '../src';

async function main() {
  process.exitCode = mainExtract(process.argv.slice(2));
}

main().catch(error => {
  logger.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
