import { readFileSync } from 'node:fs';
import path from 'node:path';

import ts from 'typescript';

import { logger } from '../../platform/server/log';
import type { ExtractionWarning, Message } from '../../types/messages';

import { findMessages } from './intl-calls';
import {
  defaultExtractionOptions,
  type ExtractionOptions,
  type SourceScanner,
} from './types';

function scriptKind(fileName: string): ts.ScriptKind {
  switch (path.extname(fileName)) {
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    case '.js':
    case '.mjs':
    case '.cjs':
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

/**
 * Finds Intl calls in source files. Warnings accumulate across every file
 * parsed by the same instance.
 */
export class MessageExtraction implements SourceScanner {
  readonly options: ExtractionOptions;
  readonly warnings: ExtractionWarning[] = [];

  constructor(options: Partial<ExtractionOptions> = {}) {
    this.options = { ...defaultExtractionOptions, ...options };
  }

  get hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  parseFile(filePath: string, transformer = false): Map<string, Message> {
    const text = readFileSync(filePath, 'utf-8');
    return this.parseSource(text, filePath, transformer);
  }

  parseSource(
    text: string,
    fileName: string,
    transformer = false,
  ): Map<string, Message> {
    const sourceFile = ts.createSourceFile(
      fileName,
      text,
      ts.ScriptTarget.Latest,
      true,
      scriptKind(fileName),
    );

    const found = findMessages({
      sourceFile,
      transformer,
      allowEmbeddedPluralsAndGenders:
        this.options.allowEmbeddedPluralsAndGenders,
      descriptionRequired: this.options.descriptionRequired,
      warn: (node, message) => {
        const { line } = sourceFile.getLineAndCharacterOfPosition(
          node.getStart(sourceFile),
        );
        this.addWarning({ file: fileName, line: line + 1, message });
      },
    });

    const messages = new Map<string, Message>();
    for (const message of found) {
      messages.set(message.id, message);
    }
    return messages;
  }

  private addWarning(warning: ExtractionWarning) {
    this.warnings.push(warning);
    if (!this.options.suppressWarnings) {
      logger.warn(`${warning.file}:${warning.line}: ${warning.message}`);
    }
  }
}
