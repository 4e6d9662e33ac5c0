#!/usr/bin/env node

import { createProgram } from './cli.js';

createProgram()
  .parseAsync()
  .then(() => {
    process.exit(process.exitCode ?? 0);
  })
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
