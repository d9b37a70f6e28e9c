#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import { createInitCommand } from './commands/init.ts';
import { createRunCommand } from './commands/run.ts';
import { createCompareCommand } from './commands/compare.ts';
import { getVersion } from './utils/get-version.ts';

const program = new Command();

program
  .name('balancer-sim')
  .description('Load balancing simulator for a pool of processors')
  .version(getVersion());

// Register subcommands
program.addCommand(createInitCommand());
program.addCommand(createRunCommand());
program.addCommand(createCompareCommand());

program.parse(process.argv);
