#!/usr/bin/env node

/**
 * minorbuild CLI
 *
 * Build and install the latest release of every interpreter minor version
 * from a git checkout.
 */

import { Command } from 'commander';
import { installCommand } from './commands/install.js';
import { listCommand } from './commands/list.js';
import { logger } from './lib/logger.js';
import type { InstallOptions, SelectionOptions } from './lib/options.js';

// Version injected at build time via tsup define
const version = process.env['CLI_VERSION'] ?? '0.0.0-dev';

const program = new Command();

program
  .name('minorbuild')
  .description('Build and install the latest release of each interpreter minor version')
  .version(version);

function withSelectionOptions(command: Command): Command {
  return command
    .requiredOption('-d, --repo-dir <path>', 'Interpreter source checkout (git repository)')
    .option('--min <version>', 'Lowest version to build, inclusive (default: 3.0.0)')
    .option('--max <version>', 'Highest version to build, inclusive')
    .option('--marker <char>', 'Leading tag character to strip before parsing (default: v)')
    .option('-c, --config <path>', 'Config file (default: minorbuild.config.yaml in repo or cwd)')
    .option('--json', 'Output as JSON lines')
    .option('--quiet', 'Suppress output except errors')
    .option('-v, --verbose', 'Enable verbose output');
}

// Install command - build every selected version in place
withSelectionOptions(
  program
    .command('install', { isDefault: true })
    .description('Build and install the latest release of each minor version')
)
  .option('--pull', 'Run git pull before building')
  .option('--no-pull', 'Do not pull, even if the config says so')
  .option('--system-deps', 'Install build dependencies with apt/yum first (default)')
  .option('--no-system-deps', 'Skip build dependency installation')
  .option('--dry-run', 'Show what would be built without changing anything')
  .option('--strict', 'Exit with status 1 when any version fails to build')
  .action((options: InstallOptions) => {
    logger.configure({
      verbose: options.verbose,
      silent: options.quiet,
      json: options.json,
    });
    return installCommand(options);
  });

// List command - show the selected tags
withSelectionOptions(
  program.command('list').description('List the tags that would be built, newest first')
).action((options: SelectionOptions) => {
  logger.configure({
    verbose: options.verbose,
    silent: options.quiet,
    json: options.json,
  });
  return listCommand(options);
});

await program.parseAsync();
