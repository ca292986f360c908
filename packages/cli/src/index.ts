import { Command } from 'commander';
import { logger, LogLevel } from '@automark/core';
import { getVersion } from './utils/package.js';
import { withErrorHandling } from './utils/error-handling.js';
import type { CyclesOptions } from './commands/cycles.js';

/**
 * automark CLI - Main entry point
 *
 * Commands are lazily loaded via dynamic import() to minimize cold-start time.
 * Launched by bin/automark.js, which registers tsx first.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('automark')
  .description('Find packages kept installed only by circular dependencies')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory (where automark.jsonc is looked up)')
  .option('--verbose', 'print debug logging')
  .configureHelp({
    sortSubcommands: true
  });

program.hook('preAction', (thisCommand) => {
  if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
});

// =============================================================================
// LAZY-LOADED COMMANDS
// =============================================================================

program
  .command('cycles')
  .argument('[input]', 'package metadata file (apt-cache show format); "-" or omitted reads stdin')
  .description('Split candidate packages into acyclic ones and circular dependency groups')
  .option('--format <format>', 'output format: text, json, or names', 'text')
  .option('--pending <file>', 'packages still pending removal; fail if a cyclic package is missing from it')
  .option('--status', 'show the status of every package')
  .option('--no-recommends', 'do not count Recommends as dependencies')
  .option('--width <columns>', 'line width for column output')
  .option('--config <path>', 'config file (default: automark.jsonc or automark.json in --cwd)')
  .action(withErrorHandling(async (input: string | undefined, options: CyclesOptions, command: Command) => {
    const { setupCyclesCommand } = await import('./commands/cycles.js');
    await setupCyclesCommand(input, options, command);
  }));

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // If no arguments provided (just 'automark'), show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    // Parse command line arguments
    await program.parseAsync();

  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Export the program for testing purposes
export { program };
