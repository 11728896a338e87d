/**
 * tokenloom check command
 *
 * Validates a rule file by building a tokenizer from it.
 */

import { RuleSetError, createTokenizer, describeScanner } from '@tokenloom/lexer';
import { Command } from 'commander';
import * as path from 'node:path';
import { createPalette } from '../reporter';
import { loadRuleFile } from '../rules/loader';

export interface CheckOptions {
  color?: boolean;
}

/**
 * @returns process exit code: 0 valid, 1 invalid rules, 2 unreadable file
 */
export async function runCheck(
  rulesPath: string,
  options: CheckOptions = {},
  cwd: string = process.cwd(),
): Promise<number> {
  const c = createPalette(options.color === false);
  const resolved = path.resolve(cwd, rulesPath);

  try {
    const tokenizer = createTokenizer(await loadRuleFile(resolved));
    const count = tokenizer.scanners.length;

    console.log(c.green(`  ✓ ${rulesPath}: ${count} scanner${count !== 1 ? 's' : ''}`));
    tokenizer.scanners.forEach((scanner, index) => {
      console.log(`    ${c.gray(`${index + 1}.`)} ${describeScanner(scanner)}`);
    });
    return 0;
  } catch (error) {
    if (error instanceof RuleSetError) {
      console.log(c.red(`  ✗ ${rulesPath}`));
      for (const issue of error.issues) {
        console.log(`    ${issue}`);
      }
      return 1;
    }
    console.error('Error:', error instanceof Error ? error.message : error);
    return 2;
  }
}

export const checkCommand = new Command('check')
  .description('Validate a rule file and list its scanners')
  .argument('<rules>', 'YAML rule file')
  .option('--no-color', 'Disable colored output')
  .action(async (rules: string, options: CheckOptions) => {
    process.exitCode = await runCheck(rules, options);
  });
