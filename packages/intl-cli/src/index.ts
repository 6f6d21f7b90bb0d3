export { mainExtract, runExtract } from './extract';
export { mainGenerate, runGenerate } from './generate';
export {
  createExtractProgram,
  createGenerateProgram,
  type ExtractRequest,
  type ExtractSettings,
  type GenerateRequest,
  type GenerateSettings,
  isSourceFile,
  isTranslationFile,
  parseExtractArgs,
  parseGenerateArgs,
  SOURCE_EXTENSIONS,
} from './options';
