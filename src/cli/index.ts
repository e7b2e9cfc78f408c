#!/usr/bin/env node

import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { serveCommand } from './commands/serve.js';
import { statusCommand } from './commands/status.js';
import { healthCommand } from './commands/health.js';

const program = new Command();

program
  .name('aptwatch')
  .description('Scrape apartment listings and email one digest of new matches')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(serveCommand);
program.addCommand(statusCommand);
program.addCommand(healthCommand);

program.parse();
