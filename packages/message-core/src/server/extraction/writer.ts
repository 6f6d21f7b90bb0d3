import { writeFileSync } from 'node:fs';

import type { InterchangeRecord, Message } from '../../types/messages';

import { type NormalizeOptions, toInterchangeRecord } from './normalizer';

/**
 * Merge the messages of every scanned file into one id → record mapping.
 * A later file's message replaces an earlier one with the same id.
 */
export function collectInterchange(
  results: Iterable<ReadonlyMap<string, Message>>,
  options: NormalizeOptions = {},
): Record<string, InterchangeRecord> {
  // Keyed in a Map so that ids such as `__proto__` stay plain keys
  const allMessages = new Map<string, InterchangeRecord>();
  for (const messages of results) {
    for (const [id, message] of messages) {
      const record = toInterchangeRecord(message, options);
      if (record) {
        allMessages.set(id, record);
      } else {
        allMessages.delete(id);
      }
    }
  }
  return Object.fromEntries(allMessages);
}

export function serializeInterchange(
  records: Record<string, InterchangeRecord>,
): string {
  return JSON.stringify(records, null, 2);
}

export function writeInterchangeFile(
  filePath: string,
  records: Record<string, InterchangeRecord>,
): void {
  writeFileSync(filePath, serializeInterchange(records), 'utf-8');
}
