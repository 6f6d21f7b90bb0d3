import path from 'node:path';

import {
  type CodegenMode,
  defaultGenerationOptions,
  type ExtractionOptions,
  type GenerationOptions,
} from '@structured-intl/message-core';
import { Command, Option } from 'commander';

export const SOURCE_EXTENSIONS = [
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.js',
  '.jsx',
  '.mjs',
  '.cjs',
];

export function isSourceFile(filePath: string): boolean {
  return SOURCE_EXTENSIONS.includes(path.extname(filePath));
}

export function isTranslationFile(filePath: string): boolean {
  return path.extname(filePath) === '.json';
}

type OutputSettings = {
  transformer: boolean;
  outputDir: string;
};

export type ExtractSettings = ExtractionOptions &
  OutputSettings & {
    outputFile: string;
  };

export type GenerateSettings = GenerationOptions &
  OutputSettings & {
    json: boolean;
  };

export type ExtractRequest = {
  settings: ExtractSettings;
  sourceFiles: string[];
};

export type GenerateRequest = {
  settings: GenerateSettings;
  sourceFiles: string[];
  translationFiles: string[];
};

type ExtractFlags = {
  suppressWarnings: boolean;
  suppressMetaData: boolean;
  warningsAreErrors: boolean;
  embeddedPlurals: boolean;
  transformer: boolean;
  outputDir: string;
  outputFile: string;
  requireDescriptions: boolean;
};

type GenerateFlags = {
  json: boolean;
  suppressWarnings: boolean;
  outputDir: string;
  generatedFilePrefix: string;
  useDeferredLoading: boolean;
  codegenMode: CodegenMode;
  transformer: boolean;
};

const codegenModes: CodegenMode[] = ['release', 'debug'];
const defaultOutputDir = '.';

export function createExtractProgram(): Command {
  return new Command('extract-to-structured-json')
    .description(
      'Extract Intl messages from source files into a structured JSON file',
    )
    .argument('[files...]', 'source files to scan')
    .option('--suppress-warnings', 'do not print warnings', false)
    .option(
      '--suppress-meta-data',
      'write only the translation of each message',
      false,
    )
    .option(
      '--warnings-are-errors',
      'exit with an error when any warning was reported',
      false,
    )
    .option(
      '--no-embedded-plurals',
      'require plurals and genders to be at the top level of a message',
    )
    .option(
      '--transformer',
      'take message names and arguments from the enclosing function',
      false,
    )
    .option(
      '--output-dir <dir>',
      'directory to write the JSON file to',
      defaultOutputDir,
    )
    .option('--output-file <file>', 'name of the JSON file', 'messages.json')
    .option(
      '--require-descriptions',
      'warn about messages without a description',
      false,
    );
}

export function createGenerateProgram(): Command {
  return new Command('generate-from-structured-json')
    .description(
      'Generate per-locale message lookup modules from translated structured JSON files',
    )
    .argument('[files...]', 'source files followed by translated JSON files')
    .option(
      '--json',
      'write parsed messages as data instead of functions',
      false,
    )
    .option(
      '--suppress-warnings',
      'do not print warnings',
      defaultGenerationOptions.suppressWarnings,
    )
    .option(
      '--output-dir <dir>',
      'directory to write generated files to',
      defaultOutputDir,
    )
    .option(
      '--generated-file-prefix <prefix>',
      'prefix for the names of generated files',
      defaultGenerationOptions.generatedFilePrefix,
    )
    .option(
      '--no-use-deferred-loading',
      'import every locale up front instead of on demand',
    )
    .addOption(
      new Option('--codegen-mode <mode>', 'what to include in generated code')
        .choices(codegenModes)
        .default(defaultGenerationOptions.codegenMode),
    )
    .option(
      '--transformer',
      'take message names and arguments from the enclosing function',
      false,
    );
}

export function parseExtractArgs(
  argv: string[],
  program = createExtractProgram(),
): ExtractRequest {
  program.parse(argv, { from: 'user' });
  const flags = program.opts<ExtractFlags>();

  return {
    sourceFiles: program.args.filter(isSourceFile),
    settings: {
      suppressWarnings: flags.suppressWarnings,
      suppressMetaData: flags.suppressMetaData,
      warningsAreErrors: flags.warningsAreErrors,
      allowEmbeddedPluralsAndGenders: flags.embeddedPlurals,
      descriptionRequired: flags.requireDescriptions,
      transformer: flags.transformer,
      outputDir: flags.outputDir,
      outputFile: flags.outputFile,
    },
  };
}

export function parseGenerateArgs(
  argv: string[],
  program = createGenerateProgram(),
): GenerateRequest {
  program.parse(argv, { from: 'user' });
  const flags = program.opts<GenerateFlags>();

  return {
    sourceFiles: program.args.filter(isSourceFile),
    translationFiles: program.args.filter(isTranslationFile),
    settings: {
      json: flags.json,
      suppressWarnings: flags.suppressWarnings,
      outputDir: flags.outputDir,
      generatedFilePrefix: flags.generatedFilePrefix,
      useDeferredLoading: flags.useDeferredLoading,
      codegenMode: flags.codegenMode,
      transformer: flags.transformer,
    },
  };
}
