#!/usr/bin/env node
import chalk from 'chalk';
import { buildProgram } from './cli/program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
