/**
 * Rule file loading
 *
 * Rule files are YAML (JSON is valid YAML, so `.json` files load too).
 */

import { RuleSetError, parseRuleSet, type RuleSet } from '@tokenloom/lexer';
import * as fs from 'node:fs/promises';
import { YAMLParseError, parse as parseYaml } from 'yaml';

/**
 * Parse rule file content
 *
 * @throws RuleSetError for invalid YAML or an invalid rule set
 */
export function parseRules(content: string): RuleSet {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new RuleSetError([`yaml: ${err.message}`]);
    }
    throw err;
  }
  return parseRuleSet(data);
}

export async function loadRuleFile(filePath: string): Promise<RuleSet> {
  return parseRules(await fs.readFile(filePath, 'utf-8'));
}
