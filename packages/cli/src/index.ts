#!/usr/bin/env node

/**
 * tokenloom CLI - tokenize files with YAML rule sets
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check';
import { tokenizeCommand } from './commands/tokenize';

const program = new Command();

program
  .name('tokenloom')
  .description('Tokenize files with configurable scanner rules')
  .version('0.1.0');

program.addCommand(tokenizeCommand);
program.addCommand(checkCommand);

await program.parseAsync();
