#!/usr/bin/env node

/**
 * CLI entry point — registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("docflow" binary)
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';
import { runCommand } from './commands/run.js';
import { diagramCommand } from './commands/diagram.js';

const program = new Command();

program
    .name('docflow')
    .description('LLM documentation workflow — research, document, and analyze source code')
    .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(configCommand);
program.addCommand(doctorCommand);
program.addCommand(runCommand);
program.addCommand(diagramCommand);

program.parse();
