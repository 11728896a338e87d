/**
 * Tokenize result reporter
 */

import type { ScanError, Token, TokenizeResult } from '@tokenloom/lexer';
import chalk from 'chalk';

export interface ReporterOptions {
  format: 'pretty' | 'json';
  verbose?: boolean;
  noColor?: boolean;
}

export interface FileResult {
  path: string;
  result: TokenizeResult;
}

interface Palette {
  green: (s: string) => string;
  red: (s: string) => string;
  yellow: (s: string) => string;
  gray: (s: string) => string;
  cyan: (s: string) => string;
  bold: (s: string) => string;
}

const plain: Palette = {
  green: (s) => s,
  red: (s) => s,
  yellow: (s) => s,
  gray: (s) => s,
  cyan: (s) => s,
  bold: (s) => s,
};

export function createPalette(noColor = false): Palette {
  return noColor ? plain : chalk;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

function formatPosition(item: { line: number; column: number }): string {
  // Line 0 means positions were not tracked
  return item.line === 0 ? '-' : `${item.line}:${item.column}`;
}

function formatTokenLabel(token: Token): string {
  return token.subType === undefined ? token.type : `${token.type}/${token.subType}`;
}

export function formatToken(token: Token, c: Palette, verbose = false): string {
  const position = formatPosition(token).padEnd(8);
  const offset = verbose ? c.gray(`@${token.offset}`.padEnd(8)) : '';
  return `    ${c.gray(position)}${offset}${c.cyan(formatTokenLabel(token).padEnd(24))}${JSON.stringify(token.value)}`;
}

export function formatScanError(error: ScanError, c: Palette): string {
  return `    ${c.red('✗')} error  ${formatPosition(error)}  ${error.message}`;
}

/**
 * Render results as lines for a terminal
 */
export function formatPretty(results: FileResult[], options: ReporterOptions): string[] {
  const c = createPalette(options.noColor);
  const lines: string[] = [];
  let totalTokens = 0;
  let totalErrors = 0;

  for (const { path, result } of results) {
    lines.push('');
    lines.push(`  ${c.bold(path)}`);

    for (const token of result.tokens) {
      lines.push(formatToken(token, c, options.verbose));
    }

    totalTokens += result.tokens.length;
    if (!result.ok) {
      for (const error of result.errors) {
        lines.push(formatScanError(error, c));
      }
      totalErrors += result.errors.length;
    }
  }

  lines.push('');

  const summary = `${plural(totalTokens, 'token')} in ${plural(results.length, 'file')}`;
  if (totalErrors === 0) {
    lines.push(c.green(`  ✓ ${summary}`));
  } else {
    lines.push(c.red(`  ✗ ${plural(totalErrors, 'error')}, ${summary}`));
  }

  lines.push('');
  return lines;
}

/**
 * Render results as a single JSON document
 */
export function formatJson(results: FileResult[]): string {
  const output = {
    files: results.map(({ path, result }) => ({
      path,
      ok: result.ok,
      tokens: result.tokens,
      errors: result.ok ? [] : result.errors,
    })),
    summary: {
      files: results.length,
      tokens: results.reduce((sum, r) => sum + r.result.tokens.length, 0),
      errors: results.reduce((sum, r) => sum + (r.result.ok ? 0 : r.result.errors.length), 0),
    },
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Report results to stdout
 */
export function reportResults(results: FileResult[], options: ReporterOptions): void {
  if (options.format === 'json') {
    console.log(formatJson(results));
  } else {
    for (const line of formatPretty(results, options)) {
      console.log(line);
    }
  }
}

/**
 * Get exit code based on results
 */
export function getExitCode(results: FileResult[]): number {
  return results.some((r) => !r.result.ok) ? 1 : 0;
}
