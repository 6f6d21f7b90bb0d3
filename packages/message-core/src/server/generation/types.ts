import type { MessageFormatElement } from '@formatjs/icu-messageformat-parser';

import type { Message } from '../../types/messages';

export interface IcuParser {
  // Full ICU grammar: arguments, plural, select and nesting
  parseFull(text: string): MessageFormatElement[];
  // Literal text with `{name}` placeholders and nothing else
  parseLiteral(text: string): MessageFormatElement[];
}

export type ParsedTranslation = {
  id: string;
  translated: MessageFormatElement[];
};

export type TranslatedMessage = ParsedTranslation & {
  // Source-language definitions sharing the id, one per file that declares it
  originalMessages: readonly Message[];
};

export type MessageIndex = ReadonlyMap<string, readonly Message[]>;

export type CodegenMode = 'release' | 'debug';

export type GenerationOptions = {
  generatedFilePrefix: string;
  useDeferredLoading: boolean;
  codegenMode: CodegenMode;
  suppressWarnings: boolean;
};

export const defaultGenerationOptions: GenerationOptions = {
  generatedFilePrefix: '',
  useDeferredLoading: true,
  codegenMode: 'debug',
  suppressWarnings: false,
};

export interface CodeGenerator {
  readonly allLocales: Set<string>;
  generateIndividualMessageFile(
    locale: string,
    translations: TranslatedMessage[],
    targetDir: string,
  ): void;
  generateMainImportFile(): string;
  mainImportFileName(): string;
}
