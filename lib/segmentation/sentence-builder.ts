/**
 * SentenceBuilder - 文の生成
 *
 * Cuts the original text at the final boundaries. Pieces are trimmed and empty
 * pieces dropped, so whitespace between sentences belongs to no sentence.
 */

import type { Sentence } from '../types';
import { CodePointText, codePointLength } from './code-point-text';

/**
 * SentenceBuilder
 */
export class SentenceBuilder {
  /**
   * Sort, deduplicate and clamp boundaries to [0, length]
   */
  static normalizeBoundaries(boundaries: readonly number[], length: number): number[] {
    const clamped = boundaries
      .filter((boundary) => Number.isFinite(boundary))
      .map((boundary) => Math.min(length, Math.max(0, Math.trunc(boundary))));

    return [...new Set(clamped)].sort((a, b) => a - b);
  }

  /**
   * 境界で文を生成
   *
   * @returns sentences with code-point offsets of their trimmed text
   */
  static build(text: string | CodePointText, boundaries: readonly number[]): Sentence[] {
    const source = typeof text === 'string' ? new CodePointText(text) : text;
    const cuts = this.normalizeBoundaries(boundaries, source.length);
    const sentences: Sentence[] = [];

    let start = 0;
    for (const cut of [...cuts, source.length]) {
      if (cut <= start) {
        continue;
      }

      const raw = source.slice(start, cut);
      const trimmed = raw.trim();

      if (trimmed.length > 0) {
        const leading = codePointLength(raw) - codePointLength(raw.trimStart());
        const sentenceStart = start + leading;
        sentences.push({
          text: trimmed,
          start: sentenceStart,
          end: sentenceStart + codePointLength(trimmed),
        });
      }

      start = cut;
    }

    return sentences;
  }

  /**
   * Sentence texts only
   */
  static split(text: string | CodePointText, boundaries: readonly number[]): string[] {
    return this.build(text, boundaries).map((sentence) => sentence.text);
  }

  /**
   * 文をデバッグ表示用にフォーマット
   */
  static formatSentences(sentences: Sentence[]): string {
    return sentences
      .map((sentence, index) => `[${index}] ${sentence.start}-${sentence.end} | "${sentence.text.substring(0, 50).replace(/\n/g, '\\n')}"`)
      .join('\n');
  }
}
