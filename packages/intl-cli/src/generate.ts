import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import {
  buildMessageIndex,
  generateLocaleFile,
  groupByLocale,
  JsonMessageGeneration,
  logger,
  MessageExtraction,
  MessageGeneration,
} from '@structured-intl/message-core';

import {
  createGenerateProgram,
  type GenerateRequest,
  parseGenerateArgs,
} from './options';

/**
 * Write one lookup module per locale found among the translation files,
 * then the module that loads them. Returns the generated file paths.
 */
export function runGenerate({
  settings,
  sourceFiles,
  translationFiles,
}: GenerateRequest): string[] {
  // Sources only supply the originals; their warnings belong to extraction
  const extraction = new MessageExtraction({ suppressWarnings: true });
  const index = buildMessageIndex(
    sourceFiles.map(file => extraction.parseFile(file, settings.transformer)),
  );

  const generation = settings.json
    ? new JsonMessageGeneration(settings)
    : new MessageGeneration(settings);

  mkdirSync(settings.outputDir, { recursive: true });
  const written: string[] = [];
  for (const [locale, documents] of groupByLocale(translationFiles)) {
    generateLocaleFile(
      locale,
      documents,
      settings.outputDir,
      generation,
      index,
    );
    written.push(
      path.join(settings.outputDir, `${generation.localeModuleName(locale)}.ts`),
    );
  }

  const mainPath = path.join(
    settings.outputDir,
    generation.mainImportFileName(),
  );
  writeFileSync(mainPath, generation.generateMainImportFile(), 'utf-8');
  written.push(mainPath);

  logger.info(
    `Generated messages for ${generation.allLocales.size} locales in ${settings.outputDir}`,
  );
  return written;
}

/**
 * Entry point of `generate-from-structured-json`. Prints usage and succeeds
 * unless there is at least one source file and one JSON file.
 */
export function mainGenerate(
  argv: string[],
  program = createGenerateProgram(),
): number {
  const request = parseGenerateArgs(argv, program);
  if (
    request.sourceFiles.length === 0 ||
    request.translationFiles.length === 0
  ) {
    program.outputHelp();
    return 0;
  }
  runGenerate(request);
  return 0;
}
