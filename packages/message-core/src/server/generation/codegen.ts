import { writeFileSync } from 'node:fs';
import path from 'node:path';

import {
  type MessageFormatElement,
  type PluralElement,
  TYPE,
} from '@formatjs/icu-messageformat-parser';

import { logger } from '../../platform/server/log';
import { icuForm } from '../../shared/icu';
import { toLanguageTag } from '../../shared/locale';
import type { Message } from '../../types/messages';

import {
  type CodeGenerator,
  type CodegenMode,
  defaultGenerationOptions,
  type GenerationOptions,
  type TranslatedMessage,
} from './types';

const GENERATED_BY =
  '// Generated by generate-from-structured-json; do not edit by hand.';

const PLURAL_HELPER = [
  'function intlPlural(',
  '  howMany: unknown,',
  '  offset: number,',
  '  type: Intl.PluralRuleType,',
  '  clauses: Record<string, () => string>,',
  '): string {',
  '  const value = Number(howMany);',
  '  const exact = clauses[`=${value}`];',
  '  if (exact) {',
  '    return exact();',
  '  }',
  '  const category = new Intl.PluralRules(localeTag, { type }).select(',
  '    value - offset,',
  '  );',
  '  const clause = clauses[category] ?? clauses.other;',
  "  return clause ? clause() : '';",
  '}',
];

const SELECT_HELPER = [
  'function intlSelect(',
  '  choice: unknown,',
  '  clauses: Record<string, () => string>,',
  '): string {',
  '  const clause = clauses[String(choice)] ?? clauses.other;',
  "  return clause ? clause() : '';",
  '}',
];

type HelperUsage = {
  plural: boolean;
  select: boolean;
};

type PluralScope = {
  argument: string;
  offset: number;
};

type UsableTranslation = {
  translation: TranslatedMessage;
  original: Message;
};

const interpolate = (expression: string) => '${' + expression + '}';

// JSON text for a `//` comment: line and paragraph separators end the comment
function commentLiteral(text: string): string {
  return JSON.stringify(text)
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

function escapeTemplate(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/`/g, '\\`')
    .replace(/\$\{/g, () => '\\${');
}

function clausesObject(
  options: PluralElement['options'],
  usage: HelperUsage,
  scope: PluralScope | undefined,
): string {
  const entries = Object.entries(options).map(
    ([key, option]) =>
      `${JSON.stringify(key)}: () => \`${templateBody(option.value, usage, scope)}\``,
  );
  return `{ ${entries.join(', ')} }`;
}

function templateBody(
  elements: MessageFormatElement[],
  usage: HelperUsage,
  scope?: PluralScope,
): string {
  return elements
    .map(element => {
      switch (element.type) {
        case TYPE.literal:
          return escapeTemplate(element.value);
        case TYPE.argument:
        case TYPE.number:
        case TYPE.date:
        case TYPE.time:
          return interpolate(element.value);
        case TYPE.pound:
          if (scope == null) {
            return '#';
          }
          return interpolate(
            scope.offset
              ? `Number(${scope.argument}) - ${scope.offset}`
              : scope.argument,
          );
        case TYPE.plural: {
          usage.plural = true;
          const clauses = clausesObject(element.options, usage, {
            argument: element.value,
            offset: element.offset,
          });
          return interpolate(
            `intlPlural(${element.value}, ${element.offset}, ${JSON.stringify(element.pluralType ?? 'cardinal')}, ${clauses})`,
          );
        }
        case TYPE.select:
          usage.select = true;
          return interpolate(
            `intlSelect(${element.value}, ${clausesObject(element.options, usage, scope)})`,
          );
        case TYPE.tag: {
          const tag = escapeTemplate(element.value);
          const children = templateBody(element.children, usage, scope);
          return `<${tag}>${children}</${tag}>`;
        }
        default: {
          const unexpected: never = element;
          throw new Error(
            `Unsupported message element: ${JSON.stringify(unexpected)}`,
          );
        }
      }
    })
    .join('');
}

/**
 * Every argument a translation refers to, including selector arguments.
 */
export function referencedArguments(
  elements: MessageFormatElement[],
): Set<string> {
  const names = new Set<string>();
  const visit = (list: MessageFormatElement[]) => {
    for (const element of list) {
      switch (element.type) {
        case TYPE.argument:
        case TYPE.number:
        case TYPE.date:
        case TYPE.time:
          names.add(element.value);
          break;
        case TYPE.plural:
        case TYPE.select:
          names.add(element.value);
          for (const option of Object.values(element.options)) {
            visit(option.value);
          }
          break;
        case TYPE.tag:
          visit(element.children);
          break;
        default:
          break;
      }
    }
  };
  visit(elements);
  return names;
}

/**
 * Writes one message-lookup module per locale and the module that loads
 * them all.
 */
export class MessageGeneration implements CodeGenerator {
  generatedFilePrefix: string;
  useDeferredLoading: boolean;
  codegenMode: CodegenMode;
  suppressWarnings: boolean;
  readonly allLocales = new Set<string>();

  constructor(options: Partial<GenerationOptions> = {}) {
    const resolved = { ...defaultGenerationOptions, ...options };
    this.generatedFilePrefix = resolved.generatedFilePrefix;
    this.useDeferredLoading = resolved.useDeferredLoading;
    this.codegenMode = resolved.codegenMode;
    this.suppressWarnings = resolved.suppressWarnings;
  }

  localeModuleName(locale: string): string {
    return `${this.generatedFilePrefix}messages_${locale}`;
  }

  mainImportFileName(): string {
    return `${this.generatedFilePrefix}messages_all.ts`;
  }

  generateIndividualMessageFile(
    locale: string,
    translations: TranslatedMessage[],
    targetDir: string,
  ): void {
    this.allLocales.add(locale);
    const filePath = path.join(targetDir, `${this.localeModuleName(locale)}.ts`);
    writeFileSync(
      filePath,
      this.contentsOfMessagesFile(locale, translations),
      'utf-8',
    );
  }

  contentsOfMessagesFile(
    locale: string,
    translations: TranslatedMessage[],
  ): string {
    const usage: HelperUsage = { plural: false, select: false };
    const entries = this.usableTranslations(translations).flatMap(usable =>
      this.messageEntry(usable, usage),
    );

    const lines = [
      `// Message lookup for the ${commentLiteral(locale)} locale.`,
      GENERATED_BY,
      '',
      'export type MessageFunction = (...args: unknown[]) => string;',
      '',
      `export const localeName = ${JSON.stringify(locale)};`,
      '',
    ];
    if (usage.plural) {
      lines.push(
        `const localeTag = ${JSON.stringify(toLanguageTag(locale))};`,
        '',
        ...PLURAL_HELPER,
        '',
      );
    }
    if (usage.select) {
      lines.push(...SELECT_HELPER, '');
    }
    lines.push(
      'export const messages = new Map<string, MessageFunction>();',
      '',
      ...entries,
    );
    return lines.join('\n') + '\n';
  }

  generateMainImportFile(): string {
    const locales = [...this.allLocales];
    const importName = (locale: string) =>
      this.localeModuleName(locale).replace(/[^\w$]/g, '_');
    const importPath = (locale: string) => `./${this.localeModuleName(locale)}`;

    const lines = [
      '// Loads the generated message lookups of every locale.',
      GENERATED_BY,
      '',
    ];
    if (!this.useDeferredLoading) {
      lines.push(
        ...locales.map(
          locale =>
            `import * as ${importName(locale)} from '${importPath(locale)}';`,
        ),
        '',
      );
    }

    lines.push(
      'export type LocaleLibrary = {',
      '  localeName: string;',
      '  messages: unknown;',
      '};',
      '',
      'const libraries: Record<string, () => Promise<LocaleLibrary>> = {',
      ...locales.map(locale =>
        this.useDeferredLoading
          ? `  ${JSON.stringify(locale)}: () => import('${importPath(locale)}'),`
          : `  ${JSON.stringify(locale)}: async () => ${importName(locale)},`,
      ),
      '};',
      '',
      `export const availableLocales = ${JSON.stringify(locales)};`,
      '',
      'const initialized = new Map<string, LocaleLibrary>();',
      '',
      'export async function initializeMessages(',
      '  localeName: string,',
      '): Promise<boolean> {',
      '  const load = libraries[localeName];',
      '  if (!load) {',
      '    return false;',
      '  }',
      '  initialized.set(localeName, await load());',
      '  return true;',
      '}',
      '',
      'export function findLocaleLibrary(',
      '  localeName: string,',
      '): LocaleLibrary | undefined {',
      '  return initialized.get(localeName);',
      '}',
    );
    return lines.join('\n') + '\n';
  }

  protected usableTranslations(
    translations: TranslatedMessage[],
  ): UsableTranslation[] {
    const usable: UsableTranslation[] = [];
    for (const translation of translations) {
      const [original] = translation.originalMessages;
      if (original === undefined) {
        this.warn(`No original message found for '${translation.id}'`);
        continue;
      }

      const unknown = [...referencedArguments(translation.translated)].find(
        name => !original.arguments.includes(name),
      );
      if (unknown !== undefined) {
        this.warn(
          `Translation of '${translation.id}' uses '${unknown}', which is not an argument of the original message`,
        );
        continue;
      }

      usable.push({ translation, original });
    }
    return usable;
  }

  private messageEntry(
    { translation, original }: UsableTranslation,
    usage: HelperUsage,
  ): string[] {
    const params = original.arguments.map(arg => `${arg}: unknown`).join(', ');
    const body = templateBody(translation.translated, usage);
    const entry = `messages.set(${JSON.stringify(translation.id)}, (${params}) => \`${body}\`);`;
    if (this.codegenMode === 'debug') {
      return [`// Original: ${commentLiteral(icuForm(original))}`, entry];
    }
    return [entry];
  }

  protected warn(message: string) {
    if (!this.suppressWarnings) {
      logger.warn(message);
    }
  }
}

/**
 * Emits the parsed ICU elements of each translation as data instead of
 * functions.
 */
export class JsonMessageGeneration extends MessageGeneration {
  contentsOfMessagesFile(
    locale: string,
    translations: TranslatedMessage[],
  ): string {
    const messages = new Map<string, MessageFormatElement[]>();
    for (const { translation } of this.usableTranslations(translations)) {
      messages.set(translation.id, translation.translated);
    }

    return [
      `// Message data for the ${commentLiteral(locale)} locale.`,
      GENERATED_BY,
      '',
      `export const localeName = ${JSON.stringify(locale)};`,
      '',
      `export const messages = new Map<string, unknown>(${JSON.stringify([...messages], null, 2)});`,
      '',
    ].join('\n');
  }
}
