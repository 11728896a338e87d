import type { TokenType } from './token-types';

/**
 * Line and column of a character in the input
 */
export interface SourcePosition {
  /** 1-based line number, 0 when position tracking is disabled */
  line: number;
  /** 1-based column number, 0 when position tracking is disabled */
  column: number;
}

/**
 * A token produced by the tokenizer
 */
export interface Token extends Readonly<SourcePosition> {
  /** Caller-defined token type, e.g. "Comment" */
  readonly type: TokenType;
  /** Optional refinement of the type, e.g. "BlockComment" */
  readonly subType?: string;
  /** The matched text (block delimiters included or stripped per scanner) */
  readonly value: string;
  /** 0-based string index where the matched span starts */
  readonly offset: number;
}

export function createToken(
  type: TokenType,
  subType: string | undefined,
  value: string,
  offset: number,
  position: SourcePosition,
): Token {
  const token: Token =
    subType === undefined
      ? { type, value, offset, line: position.line, column: position.column }
      : { type, subType, value, offset, line: position.line, column: position.column };
  return Object.freeze(token);
}
