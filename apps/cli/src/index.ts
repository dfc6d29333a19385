#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for brandcast: check an installation, preview the
 * plan for one file, or brand a batch of files once without the watcher.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { checkCommand } from './commands/check.js';
import { planCommand } from './commands/plan.js';
import { processCommand } from './commands/process.js';

const program = new Command();

program
  .name('brandcast')
  .description('Brand videos with a static and an animated logo')
  .version('1.0.0')
  .option('-s, --settings <path>', 'Path to settings.json')
  .option('--json', 'Output in JSON format')
  .option('--debug', 'Enable debug output');

program
  .command('check')
  .description('Validate settings, logo assets and encoder availability')
  .action(checkCommand);

program
  .command('plan <file>')
  .description('Probe a video and print its segment and overlay plan')
  .action(planCommand);

program
  .command('process <files...>')
  .description('Brand the given videos once and exit')
  .action(processCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('brandcast --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
