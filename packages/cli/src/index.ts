#!/usr/bin/env node

/**
 * ehlang CLI - syntax checking and canonical formatting
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { unparseCommand } from './commands/unparse.js';

const program = new Command();

program.name('ehlang').description('CLI for the ehlang front end').version('0.1.0');

// Register commands
program.addCommand(checkCommand);
program.addCommand(unparseCommand);

// Parse arguments
program.parse();
