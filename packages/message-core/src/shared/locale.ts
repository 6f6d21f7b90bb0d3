import path from 'node:path';

/**
 * Get the locale from the end of a translation file name: everything after
 * the first underscore of the base name. `my_file_fr.json` therefore yields
 * `file_fr`, not `fr`; names must not carry underscores before the locale.
 */
export function localeFromFileName(fileName: string): string {
  const name = path.basename(fileName, path.extname(fileName));
  return name.split('_').slice(1).join('_');
}

/**
 * Best-effort BCP 47 tag for a locale taken from a file name, used to pick
 * plural rules in generated code.
 */
export function toLanguageTag(locale: string): string {
  const candidate = locale.replace(/_/g, '-');
  try {
    return Intl.getCanonicalLocales(candidate)[0] ?? 'und';
  } catch (error) {
    if (error instanceof RangeError) {
      return 'und';
    }
    throw error;
  }
}
