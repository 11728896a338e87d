import type { SourcePosition } from './token';

/** Position reported for every token when tracking is disabled */
export const UNTRACKED_POSITION: Readonly<SourcePosition> = Object.freeze({ line: 0, column: 0 });

/**
 * Tracks line and column as the tokenizer consumes input.
 *
 * Lines and columns are 1-based. Columns count code points, so a surrogate
 * pair advances the column once.
 */
export class PositionTracker {
  private line: number = 1;
  private column: number = 1;

  /**
   * Advance past consumed text
   */
  advance(text: string): void {
    for (const char of text) {
      if (char === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
    }
  }

  current(): SourcePosition {
    return { line: this.line, column: this.column };
  }
}
