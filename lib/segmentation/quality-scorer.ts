/**
 * QualityScorer - 分割品質スコア
 *
 * Post-hoc heuristic over a finished segmentation. Not used to decide boundaries.
 *
 * Penalties per sentence (additive):
 * - shorter than 3 characters: 0.1
 * - starts with a lower-case letter: 0.15
 * - shorter than 10 characters and contains "<abbreviation>.": 0.2
 */

import { codePointLength } from './code-point-text';
import { Lexicon } from './lexicon';
import { SentenceBuilder } from './sentence-builder';

export const QUALITY_PENALTIES = {
  tooShort: 0.1,
  lowercaseStart: 0.15,
  abbreviationOnly: 0.2,
} as const;

const TOO_SHORT_LENGTH = 3;
const ABBREVIATION_ONLY_LENGTH = 10;
const LOWERCASE_START = /^\p{Ll}/u;

/**
 * QualityScorer
 */
export class QualityScorer {
  constructor(private readonly lexicon: Lexicon) {}

  /**
   * @returns score in [0, 1]
   */
  score(text: string, boundaries: readonly number[]): number {
    // Zero boundaries always score 0, even for a text that is one good sentence
    if (boundaries.length === 0) {
      return 0.0;
    }

    let penalties = 0;
    for (const sentence of SentenceBuilder.split(text, boundaries)) {
      penalties += this.penalty(sentence);
    }

    return Math.min(1.0, Math.max(0.0, 1.0 - penalties));
  }

  /**
   * Penalty for a single trimmed sentence
   */
  penalty(sentence: string): number {
    const length = codePointLength(sentence);
    let penalty = 0;

    if (length < TOO_SHORT_LENGTH) {
      penalty += QUALITY_PENALTIES.tooShort;
    }

    if (LOWERCASE_START.test(sentence)) {
      penalty += QUALITY_PENALTIES.lowercaseStart;
    }

    if (length < ABBREVIATION_ONLY_LENGTH && this.lexicon.abbreviationPattern.test(sentence)) {
      penalty += QUALITY_PENALTIES.abbreviationOnly;
    }

    return penalty;
  }
}
