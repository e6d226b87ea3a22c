#!/usr/bin/env node

/**
 * changegate CLI entry point
 *
 * Validation, auto-fixing and staleness tracking for the documents of a
 * change: proposal, tasks and specs.
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { validateCommand } from './commands/validate.js';
import { fixCommand } from './commands/fix.js';
import { statusCommand } from './commands/status.js';
import { configureLogger } from '../utils/logger.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts();
  configureLogger({
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('changegate')
  .description('Validate the documents of a change before the workflow moves on.')
  .version('0.1.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('-v, --verbose', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .option('--root <path>', 'Project root directory (default: current directory)')
  .addHelpText(
    'after',
    `
Workflow:
  1. changegate init                Create .changegate/config.json
  2. changegate validate <id>       Check proposal, tasks and specs
  3. changegate fix <id>            Insert missing headings and scenarios
  4. changegate status <id>         Phase, last validation and stale files

Layout:
  workflow/changes/<id>/
  ├── proposal.md
  ├── tasks.md
  ├── specs/<spec>.md
  └── STATE.yaml
`
  );

// Register subcommands
program.addCommand(initCommand);
program.addCommand(validateCommand);
program.addCommand(fixCommand);
program.addCommand(statusCommand);

await program.parseAsync();
