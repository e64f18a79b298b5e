#!/usr/bin/env tsx
import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { registerRunCommand } from './commands/run.js';

dotenv.config();

const program = new Command();

program
  .name('pipjoin')
  .description('Batch point-in-polygon join of an identifier index against a feature service')
  .version('0.1.0');

registerRunCommand(program);

await program.parseAsync(process.argv);
