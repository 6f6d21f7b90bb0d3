import {
  type MessageFormatElement,
  parse,
  TYPE,
} from '@formatjs/icu-messageformat-parser';

import type { IcuParser } from './types';

const PLACEHOLDER = /\{\s*([A-Za-z_$][\w$]*)\s*\}/g;

function parseLiteral(text: string): MessageFormatElement[] {
  const elements: MessageFormatElement[] = [];
  let position = 0;
  for (const match of text.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    if (start > position) {
      elements.push({ type: TYPE.literal, value: text.slice(position, start) });
    }
    elements.push({ type: TYPE.argument, value: match[1] });
    position = start + match[0].length;
  }
  if (position < text.length) {
    elements.push({ type: TYPE.literal, value: text.slice(position) });
  }
  return elements;
}

export const icuParser: IcuParser = {
  // Messages have no markup, so `<b>` stays literal text
  parseFull: text => parse(text, { ignoreTag: true }),
  parseLiteral,
};
