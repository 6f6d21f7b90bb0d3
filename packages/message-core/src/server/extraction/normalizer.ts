import { icuForm } from '../../shared/icu';
import type { InterchangeRecord, Message } from '../../types/messages';

export type NormalizeOptions = {
  suppressMetaData?: boolean;
};

/**
 * Convert a message to its structured JSON record, or null when there is
 * nothing to translate.
 */
export function toInterchangeRecord(
  message: Message,
  { suppressMetaData = false }: NormalizeOptions = {},
): InterchangeRecord | null {
  if (message.pieces.length === 0) {
    return null;
  }

  const record: InterchangeRecord = { translation: icuForm(message) };
  if (!suppressMetaData) {
    Object.assign(record, structuredJsonMetadata(message));
  }
  return record;
}

export function structuredJsonMetadata(
  message: Message,
): Pick<InterchangeRecord, 'context' | 'notes'> {
  const metadata: Pick<InterchangeRecord, 'context' | 'notes'> = {};
  if (message.description) {
    metadata.context = message.description;
  }

  const notes: string[] = [];
  for (const arg of message.arguments) {
    const examples = message.examples?.[arg];
    if (examples && examples.length > 0) {
      notes.push(`Examples for ${arg}:`, ...examples);
    }
  }
  if (notes.length > 0) {
    metadata.notes = notes.join('\n');
  }

  return metadata;
}
