#!/usr/bin/env node

/**
 * repo-deck CLI entry point
 *
 * Turns a public GitHub repository into a slide presentation.
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { exportCommand } from './commands/export.js';
import { initCommand } from './commands/init.js';
import { preferencesCommand } from './commands/preferences.js';
import { configureLogger } from '../utils/logger.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts<{ quiet?: boolean; verbose?: boolean; color?: boolean }>();
  configureLogger({
    quiet: opts.quiet ?? false,
    verbose: opts.verbose ?? false,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('repo-deck')
  .description('Generate a slide presentation from a public GitHub repository.')
  .version('1.0.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('-v, --verbose', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .addHelpText(
    'after',
    `
Workflow:
  1. repo-deck init                   Create .repo-deck/config.json
  2. repo-deck generate <github-url>  Clone, analyze and render a deck
  3. repo-deck export <id> -f pdf     Export the deck in another format

Quick start:
  $ export GOOGLE_API_KEY=... PRESENTON_API_KEY=...
  $ repo-deck generate https://github.com/octocat/Hello-World
`
  );

program.addCommand(generateCommand);
program.addCommand(exportCommand);
program.addCommand(initCommand);
program.addCommand(preferencesCommand);

await program.parseAsync();
