#!/usr/bin/env node

/**
 * event-scout CLI
 */

import { Command } from 'commander';
import { searchCommand } from './commands/search.js';
import { showCommand } from './commands/show.js';
import { rateCommand } from './commands/rate.js';
import { statsCommand } from './commands/stats.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('event-scout')
  .description('Find, rank and rate volunteer events from a CSV catalog')
  .version('1.0.0');

program.addCommand(searchCommand);
program.addCommand(showCommand);
program.addCommand(rateCommand);
program.addCommand(statsCommand);
program.addCommand(serveCommand);

program.parse(process.argv);
