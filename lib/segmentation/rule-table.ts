/**
 * RuleTable - 文境界ルール表
 *
 * Priority-ordered boundary patterns. Built once per segmenter and frozen.
 */

import type { SegmentationRule } from './types';

/**
 * Shipped rules, in declaration order
 */
export const DEFAULT_RULES: readonly SegmentationRule[] = [
  {
    name: 'sentence_end_capital',
    pattern: /[.!?]+\s+(?=[А-ЯЁ«"'(])/u,
    isBoundary: true,
    priority: 50,
    description: 'Sentence end + capital letter, quote or opening parenthesis',
  },
  {
    name: 'paragraph_end',
    pattern: /[.!?]+\s*\n\s*\n/u,
    isBoundary: true,
    priority: 45,
    description: 'Sentence end + paragraph break',
  },
  {
    name: 'question_exclamation',
    pattern: /[!?]+\s+/u,
    isBoundary: true,
    priority: 40,
    description: 'Question or exclamation mark, any case after it',
  },
];

/**
 * RuleTable
 */
export class RuleTable {
  /** Rules in scan order: priority descending, declaration order on ties */
  readonly rules: readonly SegmentationRule[];

  private readonly byName: ReadonlyMap<string, SegmentationRule>;

  constructor(rules: readonly SegmentationRule[]) {
    const byName = new Map<string, SegmentationRule>();

    for (const rule of rules) {
      if (byName.has(rule.name)) {
        throw new Error(`Duplicate segmentation rule name: ${rule.name}`);
      }
      byName.set(rule.name, Object.freeze({ ...rule }));
    }

    // Array.prototype.sort is stable, so ties keep declaration order
    this.rules = Object.freeze([...byName.values()].sort((a, b) => b.priority - a.priority));
    this.byName = byName;
  }

  /**
   * Shipped rules plus optional extra rules
   */
  static createDefault(extraRules: readonly SegmentationRule[] = []): RuleTable {
    return new RuleTable([...DEFAULT_RULES, ...extraRules]);
  }

  get(name: string): SegmentationRule | undefined {
    return this.byName.get(name);
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * ルール表をデバッグ表示用にフォーマット
   */
  format(): string {
    return this.rules
      .map((rule, index) => {
        const kind = rule.isBoundary ? 'boundary' : 'suppress';
        return `[${index}] ${rule.name.padEnd(22)} | priority=${rule.priority} | ${kind} | ${rule.pattern.source}`;
      })
      .join('\n');
  }
}
