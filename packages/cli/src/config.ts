/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import type { Environment } from '@tokenloom/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export interface CliConfig {
  /** Default rule file for `tokenize` */
  rulesPath?: string;
  /** Logger environment (controls the minimum log level) */
  logEnvironment?: Environment;
}

const logEnvironmentSchema = z.enum(['test', 'development', 'production']);

interface EnvFile {
  dir: string;
  values: Record<string, string>;
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find the nearest .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): EnvFile | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return { dir: currentDir, values: parseEnvFile(fs.readFileSync(envPath, 'utf-8')) };
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

function parseLogEnvironment(value: string): Environment {
  const result = logEnvironmentSchema.safeParse(value);
  if (!result.success) {
    throw new Error(
      `Invalid TOKENLOOM_LOG_ENV ${JSON.stringify(value)}: expected one of ${logEnvironmentSchema.options.join(', ')}`,
    );
  }
  return result.data;
}

/**
 * Load CLI configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * A relative TOKENLOOM_RULES resolves against the directory that declared it.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const config: CliConfig = {};

  const envFile = findEnvFile(cwd);
  if (envFile) {
    if (envFile.values.TOKENLOOM_RULES) {
      config.rulesPath = path.resolve(envFile.dir, envFile.values.TOKENLOOM_RULES);
    }
    if (envFile.values.TOKENLOOM_LOG_ENV) {
      config.logEnvironment = parseLogEnvironment(envFile.values.TOKENLOOM_LOG_ENV);
    }
  }

  if (env.TOKENLOOM_RULES) {
    config.rulesPath = path.resolve(cwd, env.TOKENLOOM_RULES);
  }
  if (env.TOKENLOOM_LOG_ENV) {
    config.logEnvironment = parseLogEnvironment(env.TOKENLOOM_LOG_ENV);
  }

  return config;
}
