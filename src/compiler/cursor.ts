/**
 * Forward-only reader over a template's code points
 */

export class Cursor {
  private readonly chars: readonly string[];
  private pos = 0;

  constructor(input: string) {
    // Iterate by code point so astral characters occupy one position
    this.chars = Array.from(input);
  }

  get position(): number {
    return this.pos;
  }

  get done(): boolean {
    return this.pos >= this.chars.length;
  }

  /** Character `offset` places ahead, or empty string past the end */
  peek(offset = 0): string {
    return this.chars[this.pos + offset] ?? '';
  }

  /** Consume one character, or return empty string at the end */
  next(): string {
    const ch = this.chars[this.pos] ?? '';
    if (this.pos < this.chars.length) {
      this.pos++;
    }
    return ch;
  }

  slice(start: number, end: number = this.pos): string {
    return this.chars.slice(start, end).join('');
  }
}
