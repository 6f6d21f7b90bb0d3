import { mkdirSync } from 'node:fs';
import path from 'node:path';

import {
  collectInterchange,
  logger,
  MessageExtraction,
  writeInterchangeFile,
} from '@structured-intl/message-core';

import {
  createExtractProgram,
  type ExtractRequest,
  parseExtractArgs,
} from './options';

/**
 * Scan the source files and write their messages to one structured JSON
 * file. Returns the process exit code.
 */
export function runExtract({ settings, sourceFiles }: ExtractRequest): number {
  const extraction = new MessageExtraction(settings);
  const results = sourceFiles.map(file =>
    extraction.parseFile(file, settings.transformer),
  );

  const records = collectInterchange(results, {
    suppressMetaData: settings.suppressMetaData,
  });
  mkdirSync(settings.outputDir, { recursive: true });
  const outputPath = path.join(settings.outputDir, settings.outputFile);
  writeInterchangeFile(outputPath, records);
  logger.info(
    `Wrote ${Object.keys(records).length} messages to ${outputPath}`,
  );

  return extraction.hasWarnings && settings.warningsAreErrors ? 1 : 0;
}

/**
 * Entry point of `extract-to-structured-json`. Without any arguments it
 * prints usage and succeeds.
 */
export function mainExtract(
  argv: string[],
  program = createExtractProgram(),
): number {
  if (argv.length === 0) {
    program.outputHelp();
    return 0;
  }
  return runExtract(parseExtractArgs(argv, program));
}
