import type { SourcePosition } from './token';

/**
 * Scan failures
 *
 * Malformed input never throws: every failure found while scanning is a
 * ScanError value collected on the result. Only misconfiguration throws.
 */

interface ScanErrorBase extends SourcePosition {
  /** Human-readable description including the location */
  message: string;
  /** 0-based string index where the failure starts */
  offset: number;
}

/** No scanner (and no whitespace) matched at the offset */
export interface UnmatchedInputError extends ScanErrorBase {
  kind: 'UnmatchedInput';
  /** The code point that could not be classified */
  character: string;
}

/** A block's open delimiter matched but its close delimiter never did */
export interface UnterminatedBlockError extends ScanErrorBase {
  kind: 'UnterminatedBlock';
  open: string;
  close: string;
  tokenType: string;
  tokenSubType?: string;
}

export type ScanError = UnmatchedInputError | UnterminatedBlockError;

export type ScanErrorKind = ScanError['kind'];

function describeLocation(offset: number, position: SourcePosition): string {
  // Positions are zeroed when tracking is disabled
  if (position.line === 0) {
    return `at offset ${offset}`;
  }
  return `at line ${position.line}, column ${position.column}`;
}

export function unmatchedInput(
  character: string,
  offset: number,
  position: SourcePosition,
): UnmatchedInputError {
  return {
    kind: 'UnmatchedInput',
    message: `Unexpected character ${JSON.stringify(character)} ${describeLocation(offset, position)}`,
    character,
    offset,
    line: position.line,
    column: position.column,
  };
}

export function unterminatedBlock(
  scanner: { open: string; close: string; tokenType: string; tokenSubType?: string },
  offset: number,
  position: SourcePosition,
): UnterminatedBlockError {
  const error: UnterminatedBlockError = {
    kind: 'UnterminatedBlock',
    message: `Unterminated ${scanner.tokenSubType ?? scanner.tokenType} block: expected '${scanner.close}' to close '${scanner.open}' opened ${describeLocation(offset, position)}`,
    open: scanner.open,
    close: scanner.close,
    tokenType: scanner.tokenType,
    offset,
    line: position.line,
    column: position.column,
  };
  if (scanner.tokenSubType !== undefined) {
    error.tokenSubType = scanner.tokenSubType;
  }
  return error;
}

/**
 * Thrown when a scanner or config is rejected at registration time
 */
export class TokenizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenizerError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TokenizerError);
    }
  }
}

/**
 * Thrown by tokenizeOrThrow when a run produced scan errors
 */
export class TokenizeError extends Error {
  /** The input that failed to tokenize */
  readonly input: string;
  /** Every error collected during the run, in input order */
  readonly errors: readonly ScanError[];

  constructor(input: string, errors: readonly ScanError[]) {
    const [first] = errors;
    const summary = first ? first.message : 'Tokenization failed';
    const more = errors.length > 1 ? ` (and ${errors.length - 1} more)` : '';
    super(`${summary}${more}`);
    this.name = 'TokenizeError';
    this.input = input;
    this.errors = errors;
  }
}
