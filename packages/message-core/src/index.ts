export * from './server/extraction';
export * from './server/generation';
export { logger, type Logger } from './platform/server/log';
export { escapeIcu, icuForm, IllegalInterpolationError } from './shared/icu';
export { localeFromFileName, toLanguageTag } from './shared/locale';
export type * from './types/messages';
