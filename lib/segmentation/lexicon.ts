/**
 * Lexicon - 例外語彙
 *
 * Abbreviations, honorific titles and speech verbs. Immutable: withAbbreviations()
 * returns a new instance, so segmenters built from one lexicon never share state.
 */

import type { LexiconKind } from '../types';

export interface LexiconEntries {
  abbreviations: readonly string[];
  titles: readonly string[];
  speechVerbs: readonly string[];
}

/**
 * Lower-case and trim
 */
export function normalizeEntry(value: string): string {
  return value.toLowerCase().trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toSet(values: readonly string[]): ReadonlySet<string> {
  const set = new Set<string>();
  for (const value of values) {
    const normalized = normalizeEntry(value);
    if (normalized.length > 0) {
      set.add(normalized);
    }
  }
  return set;
}

/**
 * Lexicon
 */
export class Lexicon {
  private readonly sets: Readonly<Record<LexiconKind, ReadonlySet<string>>>;

  /** Any known abbreviation followed by a period, not preceded by a word character */
  readonly abbreviationPattern: RegExp;

  constructor(entries: LexiconEntries) {
    this.sets = Object.freeze({
      abbreviations: toSet(entries.abbreviations),
      titles: toSet(entries.titles),
      speechVerbs: toSet(entries.speechVerbs),
    });

    // Longest first so "и т.д" is tried before "д"
    const alternatives = [...this.sets.abbreviations]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);

    this.abbreviationPattern = alternatives.length > 0
      ? new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives.join('|')})\\.`, 'u')
      : /(?!)/;
  }

  has(kind: LexiconKind, value: string): boolean {
    return this.sets[kind].has(normalizeEntry(value));
  }

  isAbbreviation(value: string): boolean {
    return this.has('abbreviations', value);
  }

  isTitle(value: string): boolean {
    return this.has('titles', value);
  }

  isSpeechVerb(value: string): boolean {
    return this.has('speechVerbs', value);
  }

  /** Number of entries of a kind */
  size(kind: LexiconKind): number {
    return this.sets[kind].size;
  }

  /** Entries of a kind, sorted */
  entries(kind: LexiconKind): string[] {
    return [...this.sets[kind]].sort();
  }

  /**
   * New lexicon with extra abbreviations; this one is left as is
   */
  withAbbreviations(extra: readonly string[]): Lexicon {
    if (extra.length === 0) {
      return this;
    }

    return new Lexicon({
      abbreviations: [...this.sets.abbreviations, ...extra],
      titles: [...this.sets.titles],
      speechVerbs: [...this.sets.speechVerbs],
    });
  }
}
