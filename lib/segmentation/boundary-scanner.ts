/**
 * BoundaryScanner - 文境界候補スキャナー
 *
 * Runs every rule over the whole text in precedence order and collects the end
 * offset of each match. Blocking is left to BlockingEvaluator.
 */

import { CodePointText } from './code-point-text';
import { RuleTable } from './rule-table';
import type { BoundaryCandidate, ScanResult, SegmentationRule, SuppressedSpan } from './types';

/**
 * BoundaryScanner
 */
export class BoundaryScanner {
  constructor(private readonly ruleTable: RuleTable) {}

  /**
   * 境界候補を収集
   *
   * A span claimed by a non-boundary rule discards every candidate found later in
   * the scan (lower precedence) whose offset lies inside it, ends included.
   */
  scan(source: CodePointText): ScanResult {
    const candidates: BoundaryCandidate[] = [];
    const suppressed: BoundaryCandidate[] = [];
    const spans: SuppressedSpan[] = [];

    if (source.length === 0) {
      return { candidates, suppressed };
    }

    for (const rule of this.ruleTable.rules) {
      for (const match of this.findMatches(source, rule)) {
        if (!rule.isBoundary) {
          spans.push({ start: match.start, end: match.end, rule: rule.name });
          continue;
        }

        const candidate: BoundaryCandidate = {
          offset: match.end,
          punctuationStart: match.start,
          rule: rule.name,
          priority: rule.priority,
        };

        const claimed = spans.some((span) => candidate.offset >= span.start && candidate.offset <= span.end);
        if (claimed) {
          suppressed.push(candidate);
        } else {
          candidates.push(candidate);
        }
      }
    }

    return { candidates, suppressed };
  }

  /**
   * Non-overlapping matches of one rule, as code-point offsets
   */
  private findMatches(source: CodePointText, rule: SegmentationRule): Array<{ start: number; end: number }> {
    const matches: Array<{ start: number; end: number }> = [];
    // lastIndex lives on the instance; never exec the rule's own pattern.
    // Sticky scans stop at the first gap, so 'y' is dropped.
    const flags = `${rule.pattern.flags.replace(/[gy]/g, '')}g`;
    const regex = new RegExp(rule.pattern.source, flags);
    let match: RegExpExecArray | null;

    while ((match = regex.exec(source.text)) !== null) {
      matches.push({
        start: source.toOffset(match.index),
        end: source.toOffset(match.index + match[0].length),
      });

      // Empty match: step past one code point
      if (match[0].length === 0) {
        const codePoint = source.text.codePointAt(regex.lastIndex) ?? 0;
        regex.lastIndex += codePoint > 0xffff ? 2 : 1;
      }
    }

    return matches;
  }
}
