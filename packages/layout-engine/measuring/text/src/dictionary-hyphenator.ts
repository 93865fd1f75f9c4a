import type { Hyphenator } from '@pagewright/contracts';

/** Hyphenated spellings per locale, e.g. `{ 'en-US': ['hy-phen-ation'] }`. */
export type HyphenationDictionaries = Readonly<Record<string, readonly string[]>>;

const SOFT_BREAK = '-';

// Letters and digits form the word; anything around them (quotes, punctuation) is kept out of the lookup.
const WORD_CORE = /^([^\p{L}\p{N}]*)(.*?)([^\p{L}\p{N}]*)$/u;

const parseEntry = (entry: string): [string, number[]] => {
  const offsets: number[] = [];
  let word = '';
  for (const char of entry) {
    if (char === SOFT_BREAK) {
      if (word.length > 0) offsets.push(word.length);
      continue;
    }
    word += char;
  }
  return [word.toLowerCase(), offsets.filter((offset) => offset < word.length)];
};

/**
 * Hyphenator backed by explicit break tables. Lookups ignore case and any
 * punctuation wrapped around the word.
 */
export function createDictionaryHyphenator(dictionaries: HyphenationDictionaries): Hyphenator {
  const tables = new Map<string, Map<string, number[]>>();
  for (const [locale, entries] of Object.entries(dictionaries)) {
    tables.set(locale, new Map(entries.map(parseEntry)));
  }

  return {
    hyphenate(word: string, locale: string): readonly number[] {
      const table = tables.get(locale);
      if (!table) return [];
      const match = WORD_CORE.exec(word);
      if (!match) return [];
      const [, leading, core] = match;
      const offsets = table.get(core.toLowerCase());
      if (!offsets) return [];
      return offsets.map((offset) => offset + leading.length);
    },
  };
}
