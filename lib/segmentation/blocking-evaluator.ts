/**
 * BlockingEvaluator - 偽境界の抑制
 *
 * Decides whether a boundary candidate is a false positive. Checks run in a fixed
 * order and the first one that fires wins:
 *
 * 1. abbreviation: a known abbreviation ends right before the punctuation ("1799 г. в")
 * 2. initials: an initials-plus-surname shape within ±20 characters ("А. С. Пушкин")
 * 3. decimal: digits on both sides of the offset ("3.14")
 *
 * None of the checks throw; anything they cannot judge is "not blocked".
 */

import { CodePointText } from './code-point-text';
import { Lexicon } from './lexicon';
import type { BlockReason, BoundaryCandidate } from './types';

/** How far back abbreviations are looked up (characters) */
export const ABBREVIATION_LOOKBACK = 10;

/** Half-width of the initials context window (characters) */
export const INITIALS_WINDOW = 20;

/**
 * Single capital, period, optional second capital-period pair, capitalized word.
 * Word edges are Unicode-aware; \b only knows ASCII.
 */
export const INITIALS_PATTERN = /(?<![\p{L}\p{N}_])[А-ЯЁ]\.\s*(?:[А-ЯЁ]\.\s*)?[А-ЯЁ][а-яё]+(?![\p{L}\p{N}_])/u;

const DIGIT_PATTERN = /^\p{Nd}$/u;

/**
 * BlockingEvaluator
 */
export class BlockingEvaluator {
  constructor(private readonly lexicon: Lexicon) {}

  /**
   * @returns the reason the candidate is blocked, or null when it stands
   */
  evaluate(source: CodePointText, candidate: BoundaryCandidate): BlockReason | null {
    if (this.isAbbreviation(source, candidate.punctuationStart)) {
      return 'abbreviation';
    }

    if (this.isInitialsContext(source, candidate.offset)) {
      return 'initials';
    }

    if (this.isDecimalAdjacent(source, candidate.offset)) {
      return 'decimal';
    }

    return null;
  }

  /**
   * Does a known abbreviation end right before `punctuationStart`?
   *
   * Every substring of 1-10 characters ending there is tried, lower-cased and
   * trimmed, so " г" and "и т.д" match without splitting the text into words.
   */
  isAbbreviation(source: CodePointText, punctuationStart: number): boolean {
    if (punctuationStart <= 0 || punctuationStart > source.length) {
      return false;
    }

    const maxLookBack = Math.min(ABBREVIATION_LOOKBACK, punctuationStart);
    for (let lookBack = 1; lookBack <= maxLookBack; lookBack++) {
      const preceding = source.slice(punctuationStart - lookBack, punctuationStart);
      if (this.lexicon.isAbbreviation(preceding)) {
        return true;
      }
    }

    return false;
  }

  /**
   * Is there an initials shape anywhere in [offset - 20, offset + 20)?
   */
  isInitialsContext(source: CodePointText, offset: number): boolean {
    const start = Math.max(0, offset - INITIALS_WINDOW);
    const end = Math.min(source.length, offset + INITIALS_WINDOW);
    if (end <= start) {
      return false;
    }

    return INITIALS_PATTERN.test(source.slice(start, end));
  }

  /**
   * Digits immediately on both sides of the offset
   */
  isDecimalAdjacent(source: CodePointText, offset: number): boolean {
    if (offset <= 0 || offset >= source.length) {
      return false;
    }

    return DIGIT_PATTERN.test(source.charAt(offset - 1)) && DIGIT_PATTERN.test(source.charAt(offset));
  }
}
