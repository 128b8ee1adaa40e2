/**
 * Sentence (a piece of the original text between two boundaries)
 */
export interface Sentence {
  /** Trimmed sentence text */
  text: string;
  /** Start offset in the original text (code points, inclusive) */
  start: number;
  /** End offset in the original text (code points, exclusive) */
  end: number;
}

/**
 * Kinds of lexical exception sets
 */
export type LexiconKind = 'abbreviations' | 'titles' | 'speechVerbs';
