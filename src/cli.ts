#!/usr/bin/env node

import { createProgram } from './program.js';

const program = createProgram();

program.parse(process.argv);

if (!process.argv.slice(2).length) {
  program.help();
}
