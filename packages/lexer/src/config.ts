/**
 * Tokenizer configuration
 *
 * A config is validated and frozen once per tokenizer, so every run of the
 * same tokenizer sees the same snapshot.
 */

import { z, type ZodIssue } from 'zod';
import { TokenizerError } from './errors';

export const tokenizerConfigSchema = z
  .object({
    /** Emit whitespace runs as tokens (true) or skip them silently (false) */
    tokenizeWhitespace: z.boolean(),
    /** Keep scanning after a failure to collect more diagnostics */
    continueOnError: z.boolean(),
    /** Maximum errors collected before the run is aborted */
    errorToleranceLimit: z.number().int().nonnegative(),
    /** Compute line/column for each token */
    trackTokenPositions: z.boolean(),
  })
  .strict();

export type TokenizerConfig = Readonly<z.infer<typeof tokenizerConfigSchema>>;

export const DEFAULT_TOKENIZER_CONFIG: TokenizerConfig = Object.freeze({
  tokenizeWhitespace: true,
  continueOnError: false,
  errorToleranceLimit: 10,
  trackTokenPositions: true,
});

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
  );
}

/**
 * Merge a partial config over the defaults and validate it
 *
 * @throws TokenizerError if any field is invalid or unknown
 */
export function resolveTokenizerConfig(config: Partial<TokenizerConfig> = {}): TokenizerConfig {
  // Explicit undefined means "use the default"
  const overrides = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== undefined),
  );
  const result = tokenizerConfigSchema.safeParse({ ...DEFAULT_TOKENIZER_CONFIG, ...overrides });
  if (!result.success) {
    throw new TokenizerError(`Invalid tokenizer config: ${formatIssues(result.error.issues).join('; ')}`);
  }
  return Object.freeze(result.data);
}
