/**
 * @tokenloom/lexer - configurable tokenizing engine
 *
 * Scanners are registered in precedence order; tokenize() returns either the
 * token stream or every scan error collected under the tolerance policy.
 */

export { matchBlock, type BlockMatch } from './block-matcher';
export {
  DEFAULT_TOKENIZER_CONFIG,
  resolveTokenizerConfig,
  tokenizerConfigSchema,
  type TokenizerConfig,
} from './config';
export { ErrorCollector, type CollectorDecision, type TolerancePolicy } from './error-collector';
export {
  TokenizeError,
  TokenizerError,
  type ScanError,
  type ScanErrorKind,
  type UnmatchedInputError,
  type UnterminatedBlockError,
} from './errors';
export { PositionTracker, UNTRACKED_POSITION } from './position-tracker';
export {
  createTokenizer,
  parseRuleSet,
  ruleSetSchema,
  RuleSetError,
  type RuleSet,
  type ScannerRule,
} from './rules';
export {
  createBlockScanner,
  createRegexScanner,
  createSymbolScanner,
  describeScanner,
  type BlockScanner,
  type BlockScannerOptions,
  type RegexScanner,
  type ScannerDefinition,
  type ScannerKind,
  type SymbolScanner,
} from './scanner';
export type { SourcePosition, Token } from './token';
export { BuiltinTokenType, type TokenType } from './token-types';
export { Tokenizer, type TokenizeResult, type TokenizerOptions } from './tokenizer';
