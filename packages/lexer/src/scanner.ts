/**
 * Scanner definitions
 *
 * A scanner is one registered rule. The registry holds them in order and the
 * first scanner whose start condition matches at the cursor decides the token.
 */

import { TokenizerError } from './errors';
import type { TokenType } from './token-types';

interface ScannerBase {
  readonly tokenType: TokenType;
  readonly tokenSubType?: string;
}

/** Matches a pattern anchored at the cursor */
export interface RegexScanner extends ScannerBase {
  readonly kind: 'regex';
  /** Matched against the input from the cursor onward; only a match starting there counts */
  readonly pattern: RegExp;
}

/** Matches an exact literal */
export interface SymbolScanner extends ScannerBase {
  readonly kind: 'symbol';
  readonly literal: string;
}

/** Matches from an open delimiter to its close delimiter */
export interface BlockScanner extends ScannerBase {
  readonly kind: 'block';
  readonly open: string;
  readonly close: string;
  /** Inner open delimiters raise the depth instead of being plain content */
  readonly allowNesting: boolean;
  /** No escape handling: everything up to the close delimiter is verbatim */
  readonly rawMode: boolean;
  /** Keep the delimiters in the token value */
  readonly includeDelimiters: boolean;
  /** Escape introducer for non-raw blocks; the escaped code point never closes the block */
  readonly escape?: string;
}

export type ScannerDefinition = RegexScanner | SymbolScanner | BlockScanner;

export type ScannerKind = ScannerDefinition['kind'];

export interface BlockScannerOptions {
  allowNesting?: boolean;
  rawMode?: boolean;
  includeDelimiters?: boolean;
  escape?: string;
}

function requireNonEmpty(value: string, what: string): void {
  if (value.length === 0) {
    throw new TokenizerError(`${what} must not be empty`);
  }
}

function withSubType<T extends object>(scanner: T, tokenSubType: string | undefined): Readonly<T> {
  if (tokenSubType === undefined) {
    return Object.freeze(scanner);
  }
  requireNonEmpty(tokenSubType, 'Token sub-type');
  return Object.freeze({ ...scanner, tokenSubType });
}

/**
 * Compile a pattern for matching at the cursor.
 *
 * The source is kept as written. Matching runs on the input from the cursor
 * onward, so `^`, `\b` and lookbehinds see the cursor as the start of input.
 */
function compilePattern(pattern: string | RegExp): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');

  let compiled: RegExp;
  try {
    compiled = new RegExp(source, flags);
  } catch (err) {
    throw new TokenizerError(
      `Invalid regex pattern ${JSON.stringify(source)}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (compiled.test('')) {
    throw new TokenizerError(`Regex pattern ${JSON.stringify(source)} must not match empty input`);
  }
  return compiled;
}

export function createRegexScanner(
  pattern: string | RegExp,
  tokenType: TokenType,
  tokenSubType?: string,
): RegexScanner {
  requireNonEmpty(tokenType, 'Token type');
  return withSubType<RegexScanner>(
    { kind: 'regex', pattern: compilePattern(pattern), tokenType },
    tokenSubType,
  );
}

export function createSymbolScanner(
  literal: string,
  tokenType: TokenType,
  tokenSubType?: string,
): SymbolScanner {
  requireNonEmpty(literal, 'Symbol literal');
  requireNonEmpty(tokenType, 'Token type');
  return withSubType<SymbolScanner>({ kind: 'symbol', literal, tokenType }, tokenSubType);
}

export function createBlockScanner(
  open: string,
  close: string,
  tokenType: TokenType,
  tokenSubType?: string,
  options: BlockScannerOptions = {},
): BlockScanner {
  requireNonEmpty(open, 'Block open delimiter');
  requireNonEmpty(close, 'Block close delimiter');
  requireNonEmpty(tokenType, 'Token type');

  const scanner: BlockScanner = {
    kind: 'block',
    open,
    close,
    tokenType,
    allowNesting: options.allowNesting ?? false,
    rawMode: options.rawMode ?? false,
    includeDelimiters: options.includeDelimiters ?? true,
  };

  if (options.escape !== undefined) {
    if ([...options.escape].length !== 1) {
      throw new TokenizerError(
        `Block escape must be a single character, got ${JSON.stringify(options.escape)}`,
      );
    }
    return withSubType<BlockScanner>({ ...scanner, escape: options.escape }, tokenSubType);
  }
  return withSubType(scanner, tokenSubType);
}

/**
 * Length of the span a regex or symbol scanner matches at offset, or 0 for no match
 */
export function matchLength(scanner: RegexScanner | SymbolScanner, input: string, offset: number): number {
  if (scanner.kind === 'symbol') {
    return input.startsWith(scanner.literal, offset) ? scanner.literal.length : 0;
  }

  const match = scanner.pattern.exec(input.slice(offset));
  // Zero-length matches would never advance the cursor
  return match !== null && match.index === 0 ? match[0].length : 0;
}

/**
 * Short human-readable description of a scanner
 */
export function describeScanner(scanner: ScannerDefinition): string {
  const label =
    scanner.tokenSubType === undefined
      ? scanner.tokenType
      : `${scanner.tokenType}/${scanner.tokenSubType}`;

  switch (scanner.kind) {
    case 'regex':
      return `regex /${scanner.pattern.source}/ -> ${label}`;
    case 'symbol':
      return `symbol ${JSON.stringify(scanner.literal)} -> ${label}`;
    case 'block': {
      const flags = [
        scanner.allowNesting ? 'nesting' : null,
        scanner.rawMode ? 'raw' : null,
        scanner.includeDelimiters ? null : 'no-delimiters',
        scanner.escape === undefined ? null : `escape ${JSON.stringify(scanner.escape)}`,
      ].filter((flag): flag is string => flag !== null);
      const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
      return `block ${JSON.stringify(scanner.open)}..${JSON.stringify(scanner.close)} -> ${label}${suffix}`;
    }
  }
}
