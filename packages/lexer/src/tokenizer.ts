import type { Logger } from '@tokenloom/logger';
import { matchBlock } from './block-matcher';
import { resolveTokenizerConfig, type TokenizerConfig } from './config';
import { ErrorCollector } from './error-collector';
import { TokenizeError, unmatchedInput, unterminatedBlock, type ScanError } from './errors';
import { PositionTracker, UNTRACKED_POSITION } from './position-tracker';
import {
  createBlockScanner,
  createRegexScanner,
  createSymbolScanner,
  describeScanner,
  matchLength,
  type BlockScanner,
  type BlockScannerOptions,
  type ScannerDefinition,
} from './scanner';
import { createToken, type SourcePosition, type Token } from './token';
import { BuiltinTokenType, type TokenType } from './token-types';

export type TokenizeResult =
  | { ok: true; tokens: Token[] }
  | {
      ok: false;
      errors: ScanError[];
      /** Tokens produced before the run ended */
      tokens: Token[];
    };

export interface TokenizerOptions {
  /** Receives registration and per-run events */
  logger?: Logger;
}

/** Outcome of trying the registry at one offset */
type DispatchOutcome =
  | { kind: 'token'; scanner: ScannerDefinition; value: string; end: number }
  | { kind: 'unterminated'; scanner: BlockScanner }
  | { kind: 'none' };

function isWhitespace(char: string): boolean {
  return /\s/.test(char);
}

/**
 * Configurable tokenizer
 *
 * Scanners are tried in registration order at each offset; the first one
 * whose start condition matches produces the token. Whitespace is handled
 * before any scanner is consulted.
 *
 * @example
 * ```typescript
 * const tokenizer = Tokenizer.withConfig({ tokenizeWhitespace: false })
 *   .addBlockScanner('{', '}', 'CodeBlock', undefined, { allowNesting: true })
 *   .addRegexScanner('^[a-zA-Z_]\\w*', 'Identifier');
 *
 * const result = tokenizer.tokenize('run { a { b } }');
 * if (result.ok) {
 *   result.tokens.map((t) => t.value); // ['run', '{ a { b } }']
 * }
 * ```
 */
export class Tokenizer {
  readonly config: TokenizerConfig;
  private readonly registry: ScannerDefinition[] = [];
  private readonly logger: Logger | undefined;

  constructor(config: Partial<TokenizerConfig> = {}, options: TokenizerOptions = {}) {
    this.config = resolveTokenizerConfig(config);
    this.logger = options.logger;
  }

  static withConfig(config: Partial<TokenizerConfig> = {}, options: TokenizerOptions = {}): Tokenizer {
    return new Tokenizer(config, options);
  }

  /** Registered scanners in precedence order */
  get scanners(): readonly ScannerDefinition[] {
    return this.registry;
  }

  addRegexScanner(pattern: string | RegExp, tokenType: TokenType, tokenSubType?: string): this {
    return this.register(createRegexScanner(pattern, tokenType, tokenSubType));
  }

  addSymbolScanner(literal: string, tokenType: TokenType, tokenSubType?: string): this {
    return this.register(createSymbolScanner(literal, tokenType, tokenSubType));
  }

  addBlockScanner(
    open: string,
    close: string,
    tokenType: TokenType,
    tokenSubType?: string,
    options: BlockScannerOptions = {},
  ): this {
    return this.register(createBlockScanner(open, close, tokenType, tokenSubType, options));
  }

  private register(scanner: ScannerDefinition): this {
    this.registry.push(scanner);
    this.logger?.debug('scanner_registered', {
      index: this.registry.length - 1,
      scanner: describeScanner(scanner),
    });
    return this;
  }

  /**
   * Tokenize an input string
   *
   * Never throws on malformed input: failures are returned as scan errors.
   * The result is a failure whenever any error was collected, even if the
   * run reached the end of the input.
   */
  tokenize(input: string): TokenizeResult {
    const tokens: Token[] = [];
    const collector = new ErrorCollector(this.config);
    const tracker = this.config.trackTokenPositions ? new PositionTracker() : null;
    let cursor = 0;
    let aborted = false;

    const position = (): SourcePosition => tracker?.current() ?? UNTRACKED_POSITION;
    const consume = (end: number): void => {
      tracker?.advance(input.slice(cursor, end));
      cursor = end;
    };

    while (cursor < input.length) {
      const start = cursor;

      if (isWhitespace(input[cursor])) {
        let end = cursor + 1;
        while (end < input.length && isWhitespace(input[end])) {
          end++;
        }
        if (this.config.tokenizeWhitespace) {
          const value = input.slice(start, end);
          tokens.push(createToken(BuiltinTokenType.WHITESPACE, undefined, value, start, position()));
        }
        consume(end);
        continue;
      }

      const outcome = this.dispatch(input, cursor);

      if (outcome.kind === 'token') {
        const { scanner, value, end } = outcome;
        tokens.push(createToken(scanner.tokenType, scanner.tokenSubType, value, start, position()));
        consume(end);
        continue;
      }

      if (outcome.kind === 'unterminated') {
        collector.record(unterminatedBlock(outcome.scanner, start, position()));
        // Nothing after an unterminated block can be scanned reliably
        break;
      }

      const codePoint = input.codePointAt(cursor);
      const character = codePoint === undefined ? input[cursor] : String.fromCodePoint(codePoint);
      if (collector.record(unmatchedInput(character, start, position())) === 'abort') {
        aborted = cursor + character.length < input.length;
        break;
      }
      consume(cursor + character.length);
    }

    if (!collector.hasErrors()) {
      this.logger?.debug('tokenize_completed', {
        input_length: input.length,
        token_count: tokens.length,
      });
      return { ok: true, tokens };
    }

    const errors = collector.toArray();
    this.logger?.info('tokenize_failed', {
      input_length: input.length,
      token_count: tokens.length,
      error_count: errors.length,
      aborted,
    });
    return { ok: false, errors, tokens };
  }

  /**
   * Tokenize an input string, throwing if any scan error occurred
   *
   * @throws TokenizeError carrying every collected error
   */
  tokenizeOrThrow(input: string): Token[] {
    const result = this.tokenize(input);
    if (!result.ok) {
      throw new TokenizeError(input, result.errors);
    }
    return result.tokens;
  }

  /**
   * Try the registry in order at offset; the first start-condition match wins
   */
  private dispatch(input: string, offset: number): DispatchOutcome {
    for (const scanner of this.registry) {
      if (scanner.kind === 'block') {
        if (!input.startsWith(scanner.open, offset)) {
          continue;
        }
        // Once the open delimiter matched, the block's outcome is final
        const block = matchBlock(input, offset, scanner);
        return block.matched
          ? { kind: 'token', scanner, value: block.value, end: block.end }
          : { kind: 'unterminated', scanner };
      }

      const length = matchLength(scanner, input, offset);
      if (length > 0) {
        return {
          kind: 'token',
          scanner,
          value: input.slice(offset, offset + length),
          end: offset + length,
        };
      }
    }
    return { kind: 'none' };
  }
}
