import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { parse } from '@formatjs/icu-messageformat-parser';

import { logger } from '../../platform/server/log';
import type { Message } from '../../types/messages';

import {
  JsonMessageGeneration,
  MessageGeneration,
  referencedArguments,
} from './codegen';
import type { TranslatedMessage } from './types';

const greeting: Message = {
  id: 'greeting',
  arguments: ['name'],
  pieces: [
    { type: 'literal', value: 'Hello ' },
    { type: 'placeholder', index: 0 },
  ],
};

const items: Message = {
  id: 'items',
  arguments: ['count'],
  pieces: [
    {
      type: 'sub-message',
      selector: 'plural',
      argument: 'count',
      clauses: [
        { key: 'one', pieces: [{ type: 'literal', value: 'One item' }] },
        {
          key: 'other',
          pieces: [
            { type: 'placeholder', index: 0 },
            { type: 'literal', value: ' items' },
          ],
        },
      ],
    },
  ],
};

function translated(
  id: string,
  text: string,
  originals: Message[],
): TranslatedMessage {
  return {
    id,
    translated: parse(text, { ignoreTag: true }),
    originalMessages: originals,
  };
}

async function loadLocaleModule(filePath: string) {
  const loaded: unknown = await import(pathToFileURL(filePath).href);
  if (
    typeof loaded !== 'object' ||
    loaded === null ||
    !('messages' in loaded) ||
    !(loaded.messages instanceof Map)
  ) {
    throw new Error(`${filePath} does not export a messages map`);
  }
  const messages = loaded.messages;
  return (id: string, ...args: unknown[]): unknown => {
    const lookup: unknown = messages.get(id);
    if (typeof lookup !== 'function') {
      throw new Error(`No message '${id}' in ${filePath}`);
    }
    return lookup(...args);
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('referencedArguments', () => {
  it('collects arguments at every depth', () => {
    const elements = parse(
      '{who} has {count, plural, one {# {thing}} other {# {things}}}',
    );

    expect([...referencedArguments(elements)]).toEqual([
      'who',
      'count',
      'thing',
      'things',
    ]);
  });
});

describe('MessageGeneration', () => {
  it('writes a function per translation', () => {
    const generation = new MessageGeneration({ codegenMode: 'release' });
    const contents = generation.contentsOfMessagesFile('fr', [
      translated('greeting', 'Bonjour {name}', [greeting]),
    ]);

    expect(contents).toBe(
      [
        '// Message lookup for the "fr" locale.',
        '// Generated by generate-from-structured-json; do not edit by hand.',
        '',
        'export type MessageFunction = (...args: unknown[]) => string;',
        '',
        'export const localeName = "fr";',
        '',
        'export const messages = new Map<string, MessageFunction>();',
        '',
        'messages.set("greeting", (name: unknown) => `Bonjour ${name}`);',
        '',
      ].join('\n'),
    );
  });

  it('adds the original text in debug mode', () => {
    const generation = new MessageGeneration();
    const contents = generation.contentsOfMessagesFile('fr', [
      translated('greeting', 'Bonjour {name}', [greeting]),
    ]);

    expect(contents).toContain(
      [
        '// Original: "Hello {name}"',
        'messages.set("greeting", (name: unknown) => `Bonjour ${name}`);',
      ].join('\n'),
    );
  });

  it('writes plurals through the plural helper', () => {
    const generation = new MessageGeneration({ codegenMode: 'release' });
    const contents = generation.contentsOfMessagesFile('fr', [
      translated(
        'items',
        '{count, plural, =0 {Aucun article} one {# article} other {# articles}}',
        [items],
      ),
    ]);

    expect(contents).toContain('const localeTag = "fr";');
    expect(contents).toContain('function intlPlural(');
    expect(contents).not.toContain('function intlSelect(');
    expect(contents).toContain(
      'messages.set("items", (count: unknown) => `${intlPlural(count, 0, "cardinal", { "=0": () => `Aucun article`, "one": () => `${count} article`, "other": () => `${count} articles` })}`);',
    );
  });

  it('writes selects through the select helper', () => {
    const who: Message = {
      id: 'who',
      arguments: ['gender'],
      pieces: [{ type: 'literal', value: 'x' }],
    };
    const generation = new MessageGeneration({ codegenMode: 'release' });
    const contents = generation.contentsOfMessagesFile('de', [
      translated('who', '{gender, select, female {Sie} other {Es}}', [who]),
    ]);

    expect(contents).toContain('function intlSelect(');
    expect(contents).not.toContain('function intlPlural(');
    expect(contents).toContain(
      'messages.set("who", (gender: unknown) => `${intlSelect(gender, { "female": () => `Sie`, "other": () => `Es` })}`);',
    );
  });

  it('escapes template literal syntax in translations', () => {
    const command: Message = {
      id: 'cmd',
      arguments: [],
      pieces: [{ type: 'literal', value: 'x' }],
    };
    const generation = new MessageGeneration({ codegenMode: 'release' });
    const contents = generation.contentsOfMessagesFile('en', [
      translated('cmd', 'Run `ls` in C:\\dir', [command]),
    ]);

    expect(contents).toContain(
      'messages.set("cmd", () => `Run \\`ls\\` in C:\\\\dir`);',
    );
  });

  it('keeps duplicate translations in order', () => {
    const generation = new MessageGeneration({ codegenMode: 'release' });
    const contents = generation.contentsOfMessagesFile('fr', [
      translated('greeting', 'Salut {name}', [greeting]),
      translated('greeting', 'Bonjour {name}', [greeting]),
    ]);

    const entries = contents
      .split('\n')
      .filter(line => line.startsWith('messages.set'));
    expect(entries).toEqual([
      'messages.set("greeting", (name: unknown) => `Salut ${name}`);',
      'messages.set("greeting", (name: unknown) => `Bonjour ${name}`);',
    ]);
  });

  it('leaves out translations it cannot match to an original', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const generation = new MessageGeneration({ codegenMode: 'release' });
    const contents = generation.contentsOfMessagesFile('fr', [
      translated('ghost', 'Boo', []),
      translated('greeting', 'Bonjour {nom}', [greeting]),
    ]);

    expect(contents).not.toContain('messages.set(');
    expect(warn.mock.calls).toEqual([
      ["No original message found for 'ghost'"],
      [
        "Translation of 'greeting' uses 'nom', which is not an argument of the original message",
      ],
    ]);
  });

  it('stays quiet when warnings are suppressed', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const generation = new MessageGeneration({ suppressWarnings: true });
    generation.contentsOfMessagesFile('fr', [translated('ghost', 'Boo', [])]);

    expect(warn).not.toHaveBeenCalled();
  });

  it('escapes line separators in the original text comment', () => {
    const multiline: Message = {
      id: 'notice',
      arguments: [],
      pieces: [{ type: 'literal', value: 'Line\u2028break\u2029end' }],
    };
    const generation = new MessageGeneration();
    const contents = generation.contentsOfMessagesFile('fr', [
      translated('notice', 'Ligne', [multiline]),
    ]);

    expect(contents).toContain(
      [
        '// Original: "Line\\u2028break\\u2029end"',
        'messages.set("notice", () => `Ligne`);',
      ].join('\n'),
    );
    expect(contents).not.toMatch(/[\u2028\u2029]/);
  });

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(os.tmpdir(), 'codegen-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('writes the locale file with the configured prefix', () => {
      const generation = new MessageGeneration({ generatedFilePrefix: 'app_' });
      const translations = [translated('greeting', 'Hola {name}', [greeting])];
      generation.generateIndividualMessageFile('es', translations, dir);

      expect(readFileSync(path.join(dir, 'app_messages_es.ts'), 'utf-8')).toBe(
        generation.contentsOfMessagesFile('es', translations),
      );
      expect([...generation.allLocales]).toEqual(['es']);
      expect(generation.mainImportFileName()).toBe('app_messages_all.ts');
    });

    it('writes a module whose lookups format their arguments', async () => {
      const guests: Message = { ...items, id: 'guests' };
      const who: Message = {
        id: 'who',
        arguments: ['gender'],
        pieces: [{ type: 'literal', value: 'x' }],
      };
      const generation = new MessageGeneration({ codegenMode: 'release' });
      generation.generateIndividualMessageFile(
        'fr',
        [
          translated('greeting', 'Bonjour {name}', [greeting]),
          translated(
            'items',
            '{count, plural, =0 {Aucun article} one {# article} other {# articles}}',
            [items],
          ),
          translated(
            'guests',
            '{count, plural, offset:1 =0 {Personne} =1 {Toi seul} one {Toi et # autre} other {Toi et # autres}}',
            [guests],
          ),
          translated(
            'who',
            '{gender, select, female {Elle} male {Il} other {Iel}}',
            [who],
          ),
        ],
        dir,
      );

      const format = await loadLocaleModule(path.join(dir, 'messages_fr.ts'));

      expect(format('greeting', 'Ada')).toBe('Bonjour Ada');
      // An exact match wins over the "one" category French gives to 0
      expect([0, 1, 2, 5].map(count => format('items', count))).toEqual([
        'Aucun article',
        '1 article',
        '2 articles',
        '5 articles',
      ]);
      expect([0, 1, 2, 5].map(count => format('guests', count))).toEqual([
        'Personne',
        'Toi seul',
        'Toi et 1 autre',
        'Toi et 4 autres',
      ]);
      expect(
        ['female', 'male', 'unknown'].map(gender => format('who', gender)),
      ).toEqual(['Elle', 'Il', 'Iel']);
    });
  });

  describe('main import file', () => {
    it('loads locales lazily by default', () => {
      const generation = new MessageGeneration({ generatedFilePrefix: 'app_' });
      generation.allLocales.add('fr');
      generation.allLocales.add('pt_BR');

      const contents = generation.generateMainImportFile();
      expect(contents).not.toContain('import * as');
      expect(contents).toContain(
        [
          'const libraries: Record<string, () => Promise<LocaleLibrary>> = {',
          '  "fr": () => import(\'./app_messages_fr\'),',
          '  "pt_BR": () => import(\'./app_messages_pt_BR\'),',
          '};',
        ].join('\n'),
      );
      expect(contents).toContain(
        'export const availableLocales = ["fr","pt_BR"];',
      );
    });

    it('imports every locale up front without deferred loading', () => {
      const generation = new MessageGeneration({ useDeferredLoading: false });
      generation.allLocales.add('fr');
      generation.allLocales.add('messages_de');

      const contents = generation.generateMainImportFile();
      expect(contents).toContain(
        [
          "import * as messages_fr from './messages_fr';",
          "import * as messages_messages_de from './messages_messages_de';",
        ].join('\n'),
      );
      expect(contents).toContain('  "fr": async () => messages_fr,');
      expect(contents).toContain(
        '  "messages_de": async () => messages_messages_de,',
      );
    });
  });
});

describe('JsonMessageGeneration', () => {
  it('writes parsed translations as data', () => {
    const generation = new JsonMessageGeneration();
    const contents = generation.contentsOfMessagesFile('de', [
      translated('greeting', 'Hallo {name}', [greeting]),
    ]);

    const entries = [
      [
        'greeting',
        [
          { type: 0, value: 'Hallo ' },
          { type: 1, value: 'name' },
        ],
      ],
    ];
    expect(contents).toBe(
      [
        '// Message data for the "de" locale.',
        '// Generated by generate-from-structured-json; do not edit by hand.',
        '',
        'export const localeName = "de";',
        '',
        `export const messages = new Map<string, unknown>(${JSON.stringify(entries, null, 2)});`,
        '',
      ].join('\n'),
    );
  });

  it('keeps ids that name Object.prototype members', () => {
    const proto: Message = { ...greeting, id: '__proto__' };
    const generation = new JsonMessageGeneration();
    const contents = generation.contentsOfMessagesFile('de', [
      translated('__proto__', 'Hallo {name}', [proto]),
    ]);

    expect(contents).toContain('[\n  [\n    "__proto__",\n    [\n');
  });
});
