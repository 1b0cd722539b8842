#!/usr/bin/env node
import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { createGenerateCommand } from './commands/generate.js';
import { createEncryptCommand } from './commands/encrypt.js';
import { createKeygenCommand } from './commands/keygen.js';

const program = new Command();

program
  .name('scriptdoc')
  .description('Generate standardized Markdown documentation for notebook scripts')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      logger.setVerbose(true);
    }
    if (opts.quiet) {
      logger.setQuiet(true);
    }
  });

// Add commands
program.addCommand(createGenerateCommand(), { isDefault: true });
program.addCommand(createEncryptCommand());
program.addCommand(createKeygenCommand());

// Parse arguments
await program.parseAsync();
