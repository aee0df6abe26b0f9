#!/usr/bin/env node
import { createProgram } from './cli.js';

const program = createProgram();

// Show help if no command
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(process.argv);
