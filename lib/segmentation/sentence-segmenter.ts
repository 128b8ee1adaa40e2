/**
 * SentenceSegmenter - ルールベース文分割エンジン
 *
 * Russian sentence boundaries from regular-expression rules plus exception checks.
 * Immutable after construction: one instance may serve any number of callers.
 */

import { segmenterOptionsSchema, formatIssues, type SegmenterOptions } from '../validation';
import { BlockingEvaluator } from './blocking-evaluator';
import { BoundaryScanner } from './boundary-scanner';
import { CodePointText } from './code-point-text';
import { Lexicon } from './lexicon';
import { loadLexicon } from './lexicon-loader';
import { QualityScorer } from './quality-scorer';
import { RuleTable } from './rule-table';
import { SentenceBuilder } from './sentence-builder';
import type { BenchmarkStats, EvaluatedCandidate, SegmentationResult } from './types';

/**
 * SentenceSegmenter
 */
export class SentenceSegmenter {
  readonly ruleTable: RuleTable;

  readonly lexicon: Lexicon;

  private readonly scanner: BoundaryScanner;

  private readonly evaluator: BlockingEvaluator;

  private readonly scorer: QualityScorer;

  private readonly debug: boolean;

  /**
   * @param options - extra abbreviations/rules, lexicon file, debug mode
   * @throws when the options or the lexicon file are invalid
   */
  constructor(options: SegmenterOptions = {}) {
    const parsed = segmenterOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new Error(`Invalid segmenter options:\n${formatIssues(parsed.error)}`);
    }

    const { extraAbbreviations = [], extraRules = [], lexiconPath, debug = false } = parsed.data;

    this.lexicon = loadLexicon(lexiconPath).withAbbreviations(extraAbbreviations);
    this.ruleTable = RuleTable.createDefault(extraRules);
    this.scanner = new BoundaryScanner(this.ruleTable);
    this.evaluator = new BlockingEvaluator(this.lexicon);
    this.scorer = new QualityScorer(this.lexicon);
    this.debug = debug;

    if (this.debug) {
      console.log('[SentenceSegmenter] === Rule Table ===');
      console.log(this.ruleTable.format());
    }
  }

  /**
   * 文境界を検出
   *
   * @returns ascending, deduplicated code-point offsets where a new sentence starts.
   *          The end of the text is never included.
   */
  findSentenceBoundaries(text: string): number[] {
    return this.collect(new CodePointText(text)).boundaries;
  }

  /**
   * Heuristic quality of a segmentation (0-1).
   * `boundaries` should come from findSentenceBoundaries() on the same text.
   */
  getQualityScore(text: string, boundaries: readonly number[]): number {
    return this.scorer.score(text, boundaries);
  }

  /**
   * テキストを文に分割
   *
   * アルゴリズム：
   * 1. 境界候補スキャン（ルール優先度順）
   * 2. 偽境界の抑制（略語・イニシャル・小数）
   * 3. 文の生成
   * 4. 品質スコア
   */
  segment(text: string): SegmentationResult {
    const startTime = Date.now();
    const source = new CodePointText(text);

    const { boundaries, evaluated } = this.collect(source);
    const sentences = SentenceBuilder.build(source, boundaries);
    const qualityScore = this.scorer.score(text, boundaries);

    if (this.debug) {
      console.log(`[SentenceSegmenter] === Candidates (${evaluated.length}) ===`);
      evaluated.forEach((c, i) => {
        console.log(`[${i}] ${c.rule.padEnd(22)} | offset=${c.offset} | ${c.verdict}`);
      });
      console.log(`[SentenceSegmenter] === Sentences (${sentences.length}) ===`);
      console.log(SentenceBuilder.formatSentences(sentences));
    }

    const processingTime = Date.now() - startTime;

    if (this.debug) {
      console.log(
        `[SentenceSegmenter] ✅ Completed in ${processingTime}ms (${evaluated.length} candidates → ${boundaries.length} boundaries, score=${qualityScore.toFixed(2)})`
      );
    }

    const result: SegmentationResult = {
      boundaries,
      sentences,
      qualityScore,
      processingTime,
    };

    if (this.debug) {
      result.debug = { candidates: evaluated };
    }

    return result;
  }

  /**
   * パフォーマンスベンチマーク
   *
   * @param text - テストテキスト
   * @param iterations - 反復回数
   */
  benchmark(text: string, iterations = 100): BenchmarkStats {
    const runs = Math.max(1, Math.trunc(iterations));
    const times: number[] = [];

    for (let i = 0; i < runs; i++) {
      const startTime = performance.now();
      this.findSentenceBoundaries(text);
      times.push(performance.now() - startTime);
    }

    times.sort((a, b) => a - b);

    return {
      avg: times.reduce((sum, t) => sum + t, 0) / times.length,
      min: times[0],
      max: times[times.length - 1],
      p50: times[Math.floor(times.length * 0.5)],
      p95: times[Math.floor(times.length * 0.95)],
      p99: times[Math.floor(times.length * 0.99)],
    };
  }

  /**
   * Scan, then evaluate every raw candidate on its own. An offset stays when at
   * least one candidate for it survives blocking.
   */
  private collect(source: CodePointText): { boundaries: number[]; evaluated: EvaluatedCandidate[] } {
    const { candidates, suppressed } = this.scanner.scan(source);
    const accepted = new Set<number>();
    const evaluated: EvaluatedCandidate[] = [];

    for (const candidate of candidates) {
      const reason = this.evaluator.evaluate(source, candidate);
      if (reason === null) {
        accepted.add(candidate.offset);
      }
      if (this.debug) {
        evaluated.push({ ...candidate, verdict: reason ?? 'accepted' });
      }
    }

    if (this.debug) {
      for (const candidate of suppressed) {
        evaluated.push({ ...candidate, verdict: 'suppressed' });
      }
    }

    return {
      boundaries: [...accepted].sort((a, b) => a - b),
      evaluated,
    };
  }
}

let defaultSegmenter: SentenceSegmenter | null = null;

/**
 * Shared default segmenter, created on first use
 */
export function getSentenceSegmenter(): SentenceSegmenter {
  if (defaultSegmenter === null) {
    defaultSegmenter = new SentenceSegmenter();
  }
  return defaultSegmenter;
}

/**
 * 文境界を検出（共有インスタンス）
 */
export function findSentenceBoundaries(text: string): number[] {
  return getSentenceSegmenter().findSentenceBoundaries(text);
}

/**
 * 品質スコア（共有インスタンス）
 */
export function getQualityScore(text: string, boundaries: readonly number[]): number {
  return getSentenceSegmenter().getQualityScore(text, boundaries);
}
