export { MessageExtraction } from './extraction';
export { findMessages, type ScanContext } from './intl-calls';
export { structuredJsonMetadata, toInterchangeRecord } from './normalizer';
export type { NormalizeOptions } from './normalizer';
export {
  defaultExtractionOptions,
  type ExtractionOptions,
  type SourceScanner,
} from './types';
export {
  collectInterchange,
  serializeInterchange,
  writeInterchangeFile,
} from './writer';
