import type { LineSource } from '../../domain/index.js';

/**
 * In-memory line source, for tests and for logs already held as a string.
 */
export class ArrayLineSource implements LineSource {
  private readonly lines: readonly string[];
  private index = 0;

  constructor(lines: readonly string[]) {
    this.lines = lines;
  }

  /** Splits text on LF or CRLF. */
  static fromText(text: string): ArrayLineSource {
    return new ArrayLineSource(text.split(/\r?\n/));
  }

  async nextLine(): Promise<string | null> {
    if (this.index >= this.lines.length) return null;
    const line = this.lines[this.index] ?? null;
    this.index++;
    return line;
  }
}
