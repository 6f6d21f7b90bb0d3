import type { Message } from '../../types/messages';

export interface SourceScanner {
  parseFile(filePath: string, transformer?: boolean): Map<string, Message>;
  parseSource(
    text: string,
    fileName: string,
    transformer?: boolean,
  ): Map<string, Message>;
}

export type ExtractionOptions = {
  suppressWarnings: boolean;
  suppressMetaData: boolean;
  warningsAreErrors: boolean;
  // Allow plurals and genders inside a larger message, not only at the top level
  allowEmbeddedPluralsAndGenders: boolean;
  descriptionRequired: boolean;
};

export const defaultExtractionOptions: ExtractionOptions = {
  suppressWarnings: false,
  suppressMetaData: false,
  warningsAreErrors: false,
  allowEmbeddedPluralsAndGenders: true,
  descriptionRequired: false,
};
