/**
 * tokenloom tokenize command
 */

import {
  RuleSetError,
  createTokenizer,
  type RuleSet,
  type Tokenizer,
  type TokenizerConfig,
} from '@tokenloom/lexer';
import { createFileSink, createLogger, type Logger } from '@tokenloom/logger';
import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig } from '../config';
import { resolveInputFiles } from '../files';
import { reportResults, getExitCode, type FileResult, type ReporterOptions } from '../reporter';
import { loadRuleFile } from '../rules/loader';

export interface TokenizeOptions {
  rules?: string;
  format: string;
  color: boolean;
  continueOnError?: boolean;
  tolerance?: number;
  skipWhitespace?: boolean;
  positions: boolean;
  logFile?: string;
  verbose?: boolean;
}

/** Exit code for usage and configuration problems */
const USAGE_ERROR = 2;

export function parseTolerance(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function isFormat(format: string): format is ReporterOptions['format'] {
  return format === 'pretty' || format === 'json';
}

/**
 * Config overrides from command-line flags; only flags that were given apply
 */
export function configOverrides(options: TokenizeOptions): Partial<TokenizerConfig> {
  return {
    ...(options.continueOnError ? { continueOnError: true } : {}),
    ...(options.tolerance !== undefined ? { errorToleranceLimit: options.tolerance } : {}),
    ...(options.skipWhitespace ? { tokenizeWhitespace: false } : {}),
    ...(options.positions === false ? { trackTokenPositions: false } : {}),
  };
}

function buildTokenizer(ruleSet: RuleSet, options: TokenizeOptions, logger: Logger): Tokenizer {
  return createTokenizer(
    { ...ruleSet, config: { ...ruleSet.config, ...configOverrides(options) } },
    { logger },
  );
}

function reportRuleSetError(rulesPath: string, error: RuleSetError): void {
  console.error(`Invalid rule file: ${rulesPath}`);
  for (const issue of error.issues) {
    console.error(`  ${issue}`);
  }
}

/**
 * Tokenize every file under paths and report the results
 *
 * @returns process exit code: 0 clean, 1 scan errors, 2 usage or configuration errors
 */
export async function runTokenize(
  paths: string[],
  options: TokenizeOptions,
  cwd: string = process.cwd(),
): Promise<number> {
  const config = loadConfig(cwd);

  const rulesPath = options.rules ? path.resolve(cwd, options.rules) : config.rulesPath;
  if (!rulesPath) {
    console.error('No rule file given: pass --rules or set TOKENLOOM_RULES');
    return USAGE_ERROR;
  }

  if (!isFormat(options.format)) {
    console.error(`Unknown format: ${options.format}`);
    return USAGE_ERROR;
  }

  const logger = createLogger({
    environment: config.logEnvironment ?? (options.verbose ? 'development' : 'production'),
    consoleOnly: !options.logFile,
    sink: options.logFile ? createFileSink(path.resolve(cwd, options.logFile)) : undefined,
  });

  try {
    let tokenizer: Tokenizer;
    try {
      tokenizer = buildTokenizer(await loadRuleFile(rulesPath), options, logger);
    } catch (error) {
      if (error instanceof RuleSetError) {
        reportRuleSetError(rulesPath, error);
        return USAGE_ERROR;
      }
      throw error;
    }

    const { files, missing } = await resolveInputFiles(paths, cwd);
    if (missing.length > 0) {
      for (const p of missing) {
        console.error(`Path not found: ${p}`);
      }
      return USAGE_ERROR;
    }

    const results: FileResult[] = [];
    for (const file of files) {
      const content = await fs.readFile(file, 'utf-8');
      results.push({ path: path.relative(cwd, file) || file, result: tokenizer.tokenize(content) });
    }

    reportResults(results, {
      format: options.format,
      verbose: options.verbose,
      noColor: !options.color,
    });

    const exitCode = getExitCode(results);
    logger.info('tokenize_run_finished', { files: results.length, exit_code: exitCode });
    return exitCode;
  } finally {
    await logger.flush();
  }
}

export const tokenizeCommand = new Command('tokenize')
  .description('Tokenize files and print their tokens')
  .argument('<paths...>', 'Files or directories to tokenize')
  .option('-r, --rules <file>', 'YAML rule file (defaults to TOKENLOOM_RULES)')
  .addOption(
    new Option('--format <type>', 'Output format').choices(['pretty', 'json']).default('pretty'),
  )
  .option('--no-color', 'Disable colored output')
  .option('--continue-on-error', 'Keep scanning after an error')
  .option('--tolerance <n>', 'Maximum errors collected before aborting', parseTolerance)
  .option('--skip-whitespace', 'Do not emit whitespace tokens')
  .option('--no-positions', 'Do not compute line and column numbers')
  .option('--log-file <path>', 'Append log entries to a file as JSON lines')
  .option('-v, --verbose', 'Show token offsets and log at info level')
  .action(async (paths: string[], options: TokenizeOptions) => {
    try {
      process.exitCode = await runTokenize(paths, options);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exitCode = USAGE_ERROR;
    }
  });
