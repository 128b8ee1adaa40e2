/**
 * ルールベース文分割エンジン
 */

export * from './types';
export { CodePointText, codePointLength } from './code-point-text';
export { RuleTable, DEFAULT_RULES } from './rule-table';
export { Lexicon, normalizeEntry } from './lexicon';
export type { LexiconEntries } from './lexicon';
export { loadLexicon, clearLexiconCache, DEFAULT_LEXICON_PATH } from './lexicon-loader';
export { BoundaryScanner } from './boundary-scanner';
export {
  BlockingEvaluator,
  ABBREVIATION_LOOKBACK,
  INITIALS_WINDOW,
  INITIALS_PATTERN,
} from './blocking-evaluator';
export { SentenceBuilder } from './sentence-builder';
export { QualityScorer, QUALITY_PENALTIES } from './quality-scorer';
export {
  SentenceSegmenter,
  getSentenceSegmenter,
  findSentenceBoundaries,
  getQualityScore,
} from './sentence-segmenter';
