/**
 * CodePointText - コードポイント単位のテキスト
 *
 * Every offset the engine reports or consumes is a code-point offset.
 * RegExp indices are UTF-16 units, so they go through toOffset() first.
 */

export class CodePointText {
  readonly text: string;

  private readonly chars: string[];

  /** UTF-16 unit index → code-point offset (length text.length + 1) */
  private readonly offsets: number[];

  constructor(text: string) {
    this.text = text;
    this.chars = [];
    this.offsets = new Array<number>(text.length + 1);

    let unit = 0;
    while (unit < text.length) {
      const codePoint = text.codePointAt(unit) ?? 0;
      const width = codePoint > 0xffff ? 2 : 1;

      this.offsets[unit] = this.chars.length;
      if (width === 2) {
        this.offsets[unit + 1] = this.chars.length;
      }

      this.chars.push(text.slice(unit, unit + width));
      unit += width;
    }

    this.offsets[text.length] = this.chars.length;
  }

  /** Length in code points */
  get length(): number {
    return this.chars.length;
  }

  /** Character at a code-point offset, '' when out of range */
  charAt(offset: number): string {
    return offset >= 0 && offset < this.chars.length ? this.chars[offset] : '';
  }

  /** Substring by code-point offsets (clamped like String.prototype.slice) */
  slice(start: number, end: number = this.chars.length): string {
    return this.chars.slice(Math.max(0, start), Math.max(0, end)).join('');
  }

  /** Convert a UTF-16 unit index (e.g. RegExpExecArray.index) to a code-point offset */
  toOffset(unitIndex: number): number {
    if (unitIndex <= 0) {
      return 0;
    }
    if (unitIndex >= this.text.length) {
      return this.chars.length;
    }
    return this.offsets[unitIndex];
  }
}

/**
 * Length of a string in code points
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}
