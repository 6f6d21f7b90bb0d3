#!/usr/bin/env npx tsx
/**
 * Generate message lookup modules from translated structured JSON files.
 *
 * Usage: npx tsx bin/generate-from-structured-json.ts [options] \
 *   <source files...> <json files...>
 */

import { logger } from '@structured-intl/message-core';

import { mainGenerate } from '../src';

async function main() {
  process.exitCode = mainGenerate(process.argv.slice(2));
}

main().catch(error => {
  logger.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
