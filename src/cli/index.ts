#!/usr/bin/env node

/**
 * gatehouse CLI entry point
 */

import { loadEnvironment } from '../config';
import { createProgram } from './program';

loadEnvironment();

const program = createProgram();

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
