import {
  isLiteralElement,
  type MessageFormatElement,
} from '@formatjs/icu-messageformat-parser';

import { logger } from '../../platform/server/log';
import type { Message } from '../../types/messages';

import { icuParser } from './icu-parser';
import type {
  IcuParser,
  MessageIndex,
  ParsedTranslation,
  TranslatedMessage,
} from './types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEmptyLiteral(elements: MessageFormatElement[]): boolean {
  if (elements.length === 0) {
    return true;
  }
  const [only] = elements;
  return elements.length === 1 && isLiteralElement(only) && only.value === '';
}

function parseTranslation(
  id: string,
  text: string,
  parser: IcuParser,
): MessageFormatElement[] {
  let parsed: MessageFormatElement[];
  try {
    parsed = parser.parseFull(text);
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
    logger.debug(`Reading '${id}' as plain text: ${error.message}`);
    return parser.parseLiteral(text);
  }
  return isEmptyLiteral(parsed) ? parser.parseLiteral(text) : parsed;
}

/**
 * Parse a translated ICU string back into message elements. Returns null
 * for anything that is not a string.
 */
export function reconstruct(
  id: string,
  text: unknown,
  parser: IcuParser = icuParser,
): ParsedTranslation | null {
  if (typeof text !== 'string') {
    return null;
  }
  return { id, translated: parseTranslation(id, text, parser) };
}

/**
 * Recreate a translation from one entry of a structured JSON file. Metadata
 * entries (e.g. `@greeting`) and records without a string `translation`
 * yield null.
 */
export function recreateTranslation(
  id: string,
  messageData: unknown,
  parser: IcuParser = icuParser,
): ParsedTranslation | null {
  if (!isRecord(messageData)) {
    return null;
  }
  return reconstruct(id, messageData.translation, parser);
}

export function buildMessageIndex(
  extractions: Iterable<ReadonlyMap<string, Message>>,
): MessageIndex {
  const index = new Map<string, Message[]>();
  for (const messages of extractions) {
    for (const [id, message] of messages) {
      const existing = index.get(id) ?? [];
      existing.push(message);
      index.set(id, existing);
    }
  }
  for (const originals of index.values()) {
    Object.freeze(originals);
  }
  return index;
}

export function resolveOriginals(
  translations: ParsedTranslation[],
  index: MessageIndex,
): TranslatedMessage[] {
  return translations.map(translation => ({
    ...translation,
    originalMessages: index.get(translation.id) ?? [],
  }));
}
