#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { listCommand } from '../commands/list';
import { downloadCommand } from '../commands/download';
import { missingCommand } from '../commands/missing';
import { Logger } from '../utils/logger';
import { version, description } from '../../package.json';

const program = new Command();

program
  .name('chromedriver-sync')
  .description(description)
  .version(version)
  .enablePositionalOptions()
  .option('--verbose', 'Show debug output')
  .hook('preAction', (thisCommand) => {
    Logger.setVerbose(Boolean(thisCommand.opts().verbose));
  })
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str))
  });

// Register commands
listCommand(program);
downloadCommand(program);
missingCommand(program);

program.configureHelp({
  sortSubcommands: true,
  subcommandTerm: (cmd) => cmd.name()
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
