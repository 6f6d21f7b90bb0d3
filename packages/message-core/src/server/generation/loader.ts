import { readFileSync } from 'node:fs';

import JSON5 from 'json5';

import { localeFromFileName } from '../../shared/locale';
import type { InterchangeDocument } from '../../types/messages';

import {
  isRecord,
  recreateTranslation,
  resolveOriginals,
} from './reconstructor';
import type {
  CodeGenerator,
  IcuParser,
  MessageIndex,
  ParsedTranslation,
} from './types';

export function readInterchangeFile(filePath: string): InterchangeDocument {
  const raw = readFileSync(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to parse translation file ${filePath}: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new Error(`Translation file ${filePath} must contain an object`);
  }
  return parsed;
}

/**
 * Read every translation file and group the contents by the locale in its
 * name. Files for the same locale are kept in input order; nothing is
 * merged or overridden.
 */
export function groupByLocale(
  filePaths: string[],
  read: (filePath: string) => InterchangeDocument = readInterchangeFile,
): Map<string, InterchangeDocument[]> {
  // Everything is read eagerly so that several files can feed one locale
  const messagesByLocale = new Map<string, InterchangeDocument[]>();
  for (const filePath of filePaths) {
    const locale = localeFromFileName(filePath);
    const documents = messagesByLocale.get(locale) ?? [];
    documents.push(read(filePath));
    messagesByLocale.set(locale, documents);
  }
  return messagesByLocale;
}

export function translationsFor(
  documents: InterchangeDocument[],
  parser?: IcuParser,
): ParsedTranslation[] {
  const translations: ParsedTranslation[] = [];
  for (const document of documents) {
    for (const [id, messageData] of Object.entries(document)) {
      const translation = recreateTranslation(id, messageData, parser);
      if (translation) {
        translations.push(translation);
      }
    }
  }
  return translations;
}

export function generateLocaleFile(
  locale: string,
  documents: InterchangeDocument[],
  targetDir: string,
  generation: CodeGenerator,
  index: MessageIndex,
  parser?: IcuParser,
): void {
  const translations = resolveOriginals(
    translationsFor(documents, parser),
    index,
  );
  generation.generateIndividualMessageFile(locale, translations, targetDir);
}
