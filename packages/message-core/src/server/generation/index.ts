export {
  JsonMessageGeneration,
  MessageGeneration,
  referencedArguments,
} from './codegen';
export { icuParser } from './icu-parser';
export {
  generateLocaleFile,
  groupByLocale,
  readInterchangeFile,
  translationsFor,
} from './loader';
export {
  buildMessageIndex,
  reconstruct,
  recreateTranslation,
  resolveOriginals,
} from './reconstructor';
export {
  type CodeGenerator,
  type CodegenMode,
  defaultGenerationOptions,
  type GenerationOptions,
  type IcuParser,
  type MessageIndex,
  type ParsedTranslation,
  type TranslatedMessage,
} from './types';
