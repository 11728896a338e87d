/**
 * Rule sets
 *
 * A rule set is the data form of a tokenizer: an optional config plus the
 * scanners in precedence order. Rule files (YAML or JSON) parse into this
 * shape before any scanner is built.
 */

import { z } from 'zod';
import { formatIssues, tokenizerConfigSchema } from './config';
import { Tokenizer, type TokenizerOptions } from './tokenizer';

const tokenTypeFields = {
  type: z.string().min(1),
  subType: z.string().min(1).optional(),
};

const regexRuleSchema = z
  .object({
    kind: z.literal('regex'),
    pattern: z.string().min(1),
    ...tokenTypeFields,
  })
  .strict();

const symbolRuleSchema = z
  .object({
    kind: z.literal('symbol'),
    literal: z.string().min(1),
    ...tokenTypeFields,
  })
  .strict();

const blockRuleSchema = z
  .object({
    kind: z.literal('block'),
    open: z.string().min(1),
    close: z.string().min(1),
    ...tokenTypeFields,
    allowNesting: z.boolean().optional(),
    rawMode: z.boolean().optional(),
    includeDelimiters: z.boolean().optional(),
    escape: z.string().min(1).optional(),
  })
  .strict();

export const scannerRuleSchema = z.discriminatedUnion('kind', [
  regexRuleSchema,
  symbolRuleSchema,
  blockRuleSchema,
]);

export const ruleSetSchema = z
  .object({
    config: tokenizerConfigSchema.partial().optional(),
    scanners: z.array(scannerRuleSchema),
  })
  .strict();

export type ScannerRule = z.infer<typeof scannerRuleSchema>;
export type RuleSet = z.infer<typeof ruleSetSchema>;

/**
 * Thrown when a rule set fails validation
 */
export class RuleSetError extends Error {
  /** One `path: message` entry per problem */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid rule set: ${issues.join('; ')}`);
    this.name = 'RuleSetError';
    this.issues = issues;
  }
}

/**
 * Validate untyped data (e.g. parsed YAML) as a rule set
 *
 * @throws RuleSetError listing every schema violation
 */
export function parseRuleSet(data: unknown): RuleSet {
  const result = ruleSetSchema.safeParse(data);
  if (!result.success) {
    throw new RuleSetError(formatIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Build a tokenizer with the rule set's config and scanners
 *
 * Scanner-level problems that the schema cannot see (an invalid regex, for
 * instance) surface as RuleSetError with the offending rule's index.
 */
export function createTokenizer(ruleSet: RuleSet, options: TokenizerOptions = {}): Tokenizer {
  const tokenizer = Tokenizer.withConfig(ruleSet.config ?? {}, options);

  ruleSet.scanners.forEach((rule, index) => {
    try {
      addRule(tokenizer, rule);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RuleSetError([`scanners.${index}: ${message}`]);
    }
  });

  return tokenizer;
}

function addRule(tokenizer: Tokenizer, rule: ScannerRule): void {
  switch (rule.kind) {
    case 'regex':
      tokenizer.addRegexScanner(rule.pattern, rule.type, rule.subType);
      return;
    case 'symbol':
      tokenizer.addSymbolScanner(rule.literal, rule.type, rule.subType);
      return;
    case 'block':
      tokenizer.addBlockScanner(rule.open, rule.close, rule.type, rule.subType, {
        allowNesting: rule.allowNesting,
        rawMode: rule.rawMode,
        includeDelimiters: rule.includeDelimiters,
        escape: rule.escape,
      });
      return;
  }
}
