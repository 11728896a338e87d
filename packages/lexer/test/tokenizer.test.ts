import { createMockLogger } from '@tokenloom/logger/mock';
import { describe, expect, it } from 'vitest';
import { TokenizeError, Tokenizer, TokenizerError, type TokenizeResult } from '../src';

function identifiers(config: Parameters<typeof Tokenizer.withConfig>[0] = {}): Tokenizer {
  return Tokenizer.withConfig(config).addRegexScanner('^[a-zA-Z_]\\w*', 'Identifier');
}

function tokenValues(result: TokenizeResult): string[] {
  return result.tokens.map((t) => t.value);
}

describe('Tokenizer', () => {
  describe('whitespace', () => {
    it('emits maximal whitespace runs as tokens', () => {
      const result = identifiers().tokenize('a \t\n b');

      expect(result.ok).toBe(true);
      expect(result.tokens.map((t) => [t.type, t.value])).toEqual([
        ['Identifier', 'a'],
        ['Whitespace', ' \t\n '],
        ['Identifier', 'b'],
      ]);
      expect(result.tokens[1].subType).toBeUndefined();
    });

    it('skips whitespace when tokenizeWhitespace is off', () => {
      const result = identifiers({ tokenizeWhitespace: false }).tokenize('a  b');

      expect(tokenValues(result)).toEqual(['a', 'b']);
      expect(result.tokens.map((t) => t.offset)).toEqual([0, 3]);
      expect(result.tokens[1].column).toBe(4);
    });

    it('handles whitespace before any scanner', () => {
      const tokenizer = Tokenizer.withConfig().addRegexScanner('^\\s+', 'Blank');

      expect(tokenizer.tokenize('  ').tokens.map((t) => t.type)).toEqual(['Whitespace']);
    });

    it('returns no tokens for empty input', () => {
      expect(identifiers().tokenize('')).toEqual({ ok: true, tokens: [] });
    });
  });

  describe('precedence', () => {
    it('lets the first registered scanner win regardless of length', () => {
      const shortFirst = Tokenizer.withConfig()
        .addSymbolScanner('=', 'Assign')
        .addSymbolScanner('==', 'Equals');
      const longFirst = Tokenizer.withConfig()
        .addSymbolScanner('==', 'Equals')
        .addSymbolScanner('=', 'Assign');

      expect(shortFirst.tokenize('==').tokens.map((t) => t.type)).toEqual(['Assign', 'Assign']);
      expect(longFirst.tokenize('==').tokens.map((t) => t.type)).toEqual(['Equals']);
    });

    it('prefers an earlier regex over a later symbol', () => {
      const tokenizer = identifiers().addSymbolScanner('if', 'Keyword');

      expect(tokenizer.tokenize('if').tokens[0].type).toBe('Identifier');
    });

    it('falls through to later scanners when a regex does not match', () => {
      const tokenizer = Tokenizer.withConfig()
        .addRegexScanner('^\\d+', 'Number')
        .addRegexScanner('^[a-z]+', 'Word');

      expect(tokenizer.tokenize('12ab').tokens.map((t) => [t.type, t.value])).toEqual([
        ['Number', '12'],
        ['Word', 'ab'],
      ]);
    });

    it('treats a block failure as final once its open delimiter matched', () => {
      const tokenizer = Tokenizer.withConfig()
        .addBlockScanner('"', '"', 'String')
        .addSymbolScanner('"', 'Quote');

      const result = tokenizer.tokenize('"abc');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((e) => e.kind)).toEqual(['UnterminatedBlock']);
      expect(result.tokens).toEqual([]);
    });
  });

  describe('regex scanners', () => {
    it('anchors patterns at the cursor', () => {
      const tokenizer = Tokenizer.withConfig()
        .addRegexScanner('^\\d+', 'Number')
        .addRegexScanner('^[a-z]+', 'Word');

      expect(tokenValues(tokenizer.tokenize('1abc2'))).toEqual(['1', 'abc', '2']);
    });

    it('anchors every alternative at the cursor', () => {
      const tokenizer = Tokenizer.withConfig().addRegexScanner('^let|^var', 'Keyword');

      expect(tokenValues(tokenizer.tokenize('let var'))).toEqual(['let', ' ', 'var']);
    });

    it('anchors a start-of-input assertion inside a group', () => {
      const tokenizer = Tokenizer.withConfig().addRegexScanner('(^[a-z]+)', 'Word');

      expect(tokenValues(tokenizer.tokenize('ab cd'))).toEqual(['ab', ' ', 'cd']);
    });

    it('treats unanchored patterns as anchored', () => {
      const result = Tokenizer.withConfig().addRegexScanner('b', 'B').tokenize('ab');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors[0]).toMatchObject({ kind: 'UnmatchedInput', character: 'a', offset: 0 });
    });

    it('sees the cursor as a word boundary', () => {
      const tokenizer = Tokenizer.withConfig()
        .addRegexScanner('\\bx', 'X')
        .addRegexScanner('a', 'A');

      expect(tokenizer.tokenize('ax').tokens.map((t) => [t.type, t.value])).toEqual([
        ['A', 'a'],
        ['X', 'x'],
      ]);
    });

    it('accepts RegExp objects and keeps their flags', () => {
      const tokenizer = Tokenizer.withConfig().addRegexScanner(/^select/i, 'Keyword');

      expect(tokenizer.tokenize('SELECT').tokens[0]).toMatchObject({
        type: 'Keyword',
        value: 'SELECT',
      });
    });

    it('never accepts a zero-length match', () => {
      const tokenizer = Tokenizer.withConfig().addRegexScanner('(?=a)', 'Lookahead');

      const result = tokenizer.tokenize('a');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors[0]).toMatchObject({ kind: 'UnmatchedInput', character: 'a' });
    });
  });

  describe('positions', () => {
    it('tracks lines and columns across newlines', () => {
      const tokens = identifiers().tokenize('a\n  bb').tokens;

      expect(tokens.map((t) => [t.value, t.line, t.column])).toEqual([
        ['a', 1, 1],
        ['\n  ', 1, 2],
        ['bb', 2, 3],
      ]);
    });

    it('zeroes positions when tracking is disabled', () => {
      const tokens = identifiers({ trackTokenPositions: false }).tokenize('a\nb').tokens;

      expect(tokens.map((t) => [t.line, t.column, t.offset])).toEqual([
        [0, 0, 0],
        [0, 0, 1],
        [0, 0, 2],
      ]);
    });

    it('counts a surrogate pair as one column', () => {
      const tokenizer = Tokenizer.withConfig()
        .addSymbolScanner('😀', 'Emoji')
        .addRegexScanner('^[a-z]', 'Letter');

      const tokens = tokenizer.tokenize('😀a').tokens;

      expect(tokens[1]).toMatchObject({ value: 'a', offset: 2, column: 2 });
    });

    it('freezes emitted tokens', () => {
      const [token] = identifiers().tokenize('a').tokens;

      expect(Object.isFrozen(token)).toBe(true);
    });
  });

  describe('error handling', () => {
    it('stops at the first error by default', () => {
      const result = identifiers().tokenize('a$b');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toEqual([
        {
          kind: 'UnmatchedInput',
          message: 'Unexpected character "$" at line 1, column 2',
          character: '$',
          offset: 1,
          line: 1,
          column: 2,
        },
      ]);
      expect(tokenValues(result)).toEqual(['a']);
    });

    it('reports offsets when positions are not tracked', () => {
      const result = identifiers({ trackTokenPositions: false }).tokenize('ab?');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors[0].message).toBe('Unexpected character "?" at offset 2');
    });

    it('skips a whole code point after unmatched input', () => {
      const result = Tokenizer.withConfig({ continueOnError: true }).tokenize('😀x');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((e) => [e.offset, e.column])).toEqual([
        [0, 1],
        [2, 2],
      ]);
      expect(result.errors[0]).toMatchObject({ kind: 'UnmatchedInput', character: '😀' });
    });

    it('reports failure even when the scan reached the end', () => {
      const result = identifiers({ continueOnError: true }).tokenize('a$b');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toHaveLength(1);
      expect(tokenValues(result)).toEqual(['a', 'b']);
    });

    it('scans to the end with exactly errorToleranceLimit errors', () => {
      const result = identifiers({ continueOnError: true, errorToleranceLimit: 2 }).tokenize(
        'a$b$c',
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((e) => e.offset)).toEqual([1, 3]);
      expect(tokenValues(result)).toEqual(['a', 'b', 'c']);
    });

    it('aborts on the error that exceeds errorToleranceLimit', () => {
      const result = identifiers({ continueOnError: true, errorToleranceLimit: 2 }).tokenize(
        'a$b$c$d',
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((e) => e.offset)).toEqual([1, 3, 5]);
      expect(tokenValues(result)).toEqual(['a', 'b', 'c']);
    });

    it('aborts immediately with a zero tolerance limit', () => {
      const result = identifiers({ continueOnError: true, errorToleranceLimit: 0 }).tokenize('$a$');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toHaveLength(1);
      expect(result.tokens).toEqual([]);
    });

    it('stops scanning after an unterminated block even when continuing on error', () => {
      const result = identifiers({ continueOnError: true })
        .addBlockScanner('(', ')', 'Group')
        .tokenize('$ (a b');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((e) => [e.kind, e.offset])).toEqual([
        ['UnmatchedInput', 0],
        ['UnterminatedBlock', 2],
      ]);
    });
  });

  describe('tokenizeOrThrow', () => {
    it('returns tokens on success', () => {
      expect(identifiers().tokenizeOrThrow('ab').map((t) => t.value)).toEqual(['ab']);
    });

    it('throws a TokenizeError carrying every error', () => {
      const tokenizer = Tokenizer.withConfig({ continueOnError: true });

      let caught: unknown;
      try {
        tokenizer.tokenizeOrThrow('xy');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(TokenizeError);
      if (!(caught instanceof TokenizeError)) return;
      expect(caught.message).toBe('Unexpected character "x" at line 1, column 1 (and 1 more)');
      expect(caught.errors.map((e) => [e.kind, e.offset])).toEqual([
        ['UnmatchedInput', 0],
        ['UnmatchedInput', 1],
      ]);
      expect(caught.input).toBe('xy');
    });
  });

  describe('registration', () => {
    it('returns the tokenizer for chaining and exposes the registry in order', () => {
      const tokenizer = Tokenizer.withConfig()
        .addSymbolScanner(';', 'Semicolon')
        .addBlockScanner('{', '}', 'CodeBlock', undefined, { allowNesting: true })
        .addRegexScanner('^\\d+', 'Number');

      expect(tokenizer.scanners.map((s) => s.kind)).toEqual(['symbol', 'block', 'regex']);
    });

    it('rejects empty literals and delimiters', () => {
      const tokenizer = Tokenizer.withConfig();

      expect(() => tokenizer.addSymbolScanner('', 'Empty')).toThrow(
        new TokenizerError('Symbol literal must not be empty'),
      );
      expect(() => tokenizer.addBlockScanner('', '}', 'Block')).toThrow(
        'Block open delimiter must not be empty',
      );
      expect(() => tokenizer.addBlockScanner('{', '', 'Block')).toThrow(
        'Block close delimiter must not be empty',
      );
      expect(() => tokenizer.addSymbolScanner(';', '')).toThrow('Token type must not be empty');
      expect(tokenizer.scanners).toHaveLength(0);
    });

    it('rejects invalid regex patterns', () => {
      expect(() => Tokenizer.withConfig().addRegexScanner('[', 'Broken')).toThrow(
        /^Invalid regex pattern "\["/,
      );
    });

    it('rejects patterns that match empty input', () => {
      expect(() => Tokenizer.withConfig().addRegexScanner('^a*', 'Stars')).toThrow(
        'Regex pattern "^a*" must not match empty input',
      );
    });

    it('rejects multi-character escape introducers', () => {
      expect(() =>
        Tokenizer.withConfig().addBlockScanner('"', '"', 'String', undefined, { escape: '\\\\' }),
      ).toThrow(TokenizerError);
    });

    it('rejects invalid config values', () => {
      expect(() => Tokenizer.withConfig({ errorToleranceLimit: -1 })).toThrow(/errorToleranceLimit/);
      expect(() => Tokenizer.withConfig({ errorToleranceLimit: 1.5 })).toThrow(TokenizerError);
    });
  });

  describe('logging', () => {
    it('logs scanner registration', () => {
      const logger = createMockLogger();

      Tokenizer.withConfig({}, { logger }).addSymbolScanner(';', 'Semicolon', 'End');

      expect(logger.debug).toHaveBeenCalledWith('scanner_registered', {
        index: 0,
        scanner: 'symbol ";" -> Semicolon/End',
      });
    });

    it('logs completed runs', () => {
      const logger = createMockLogger();
      const tokenizer = Tokenizer.withConfig({}, { logger }).addSymbolScanner(';', 'Semicolon');

      tokenizer.tokenize(';;');

      expect(logger.debug).toHaveBeenLastCalledWith('tokenize_completed', {
        input_length: 2,
        token_count: 2,
      });
    });

    it('logs failed runs and whether they stopped early', () => {
      const logger = createMockLogger();
      const tokenizer = Tokenizer.withConfig({}, { logger }).addSymbolScanner(';', 'Semicolon');

      tokenizer.tokenize(';x;');

      expect(logger.info).toHaveBeenCalledWith('tokenize_failed', {
        input_length: 3,
        token_count: 1,
        error_count: 1,
        aborted: true,
      });
    });
  });

  it('is deterministic for a fixed registry', () => {
    const tokenizer = identifiers({ continueOnError: true }).addBlockScanner('[', ']', 'List');
    const input = 'a [b c] $ d';

    expect(tokenizer.tokenize(input)).toEqual(tokenizer.tokenize(input));
  });
});
