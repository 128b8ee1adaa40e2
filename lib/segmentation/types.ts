/**
 * ルールベース文分割 - 型定義
 * Types for the rule-based sentence boundary engine.
 */

import type { Sentence } from '../types';

/**
 * Segmentation rule
 */
export interface SegmentationRule {
  /** Unique rule name (diagnostics only) */
  name: string;

  /** Pattern; a match ending at position N proposes a boundary at N */
  pattern: RegExp;

  /** true: matches are boundary candidates. false: matches suppress later candidates */
  isBoundary: boolean;

  /** Higher runs first. Ties keep declaration order */
  priority: number;

  /** Human-readable rationale, unused at runtime */
  description: string;
}

/**
 * Why a candidate was rejected
 */
export type BlockReason = 'abbreviation' | 'initials' | 'decimal';

/**
 * Final verdict for a raw candidate
 */
export type CandidateVerdict = 'accepted' | 'suppressed' | BlockReason;

/**
 * Boundary candidate produced by the scanner.
 * Offsets are code-point offsets into the original text.
 */
export interface BoundaryCandidate {
  /** Offset right after the match: the next sentence starts here */
  offset: number;

  /** Offset of the first punctuation character of the match */
  punctuationStart: number;

  /** Rule that produced the candidate */
  rule: string;

  /** Priority of that rule */
  priority: number;
}

/**
 * Span claimed by a non-boundary rule
 */
export interface SuppressedSpan {
  start: number;
  end: number;
  rule: string;
}

/**
 * Scanner output
 */
export interface ScanResult {
  /** Candidates in scan order (rule precedence, then text order) */
  candidates: BoundaryCandidate[];

  /** Candidates discarded by a suppressive rule */
  suppressed: BoundaryCandidate[];
}

/**
 * Candidate with its verdict (debug output)
 */
export interface EvaluatedCandidate extends BoundaryCandidate {
  verdict: CandidateVerdict;
}

/**
 * Segmentation result
 */
export interface SegmentationResult {
  /** Final boundaries, ascending, deduplicated */
  boundaries: number[];

  /** Sentences between the boundaries */
  sentences: Sentence[];

  /** Heuristic quality score (0-1) */
  qualityScore: number;

  /** Processing time (ms) */
  processingTime: number;

  /** Only present when the segmenter runs with debug=true */
  debug?: {
    candidates: EvaluatedCandidate[];
  };
}

/**
 * Benchmark statistics (ms)
 */
export interface BenchmarkStats {
  avg: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  p99: number;
}
