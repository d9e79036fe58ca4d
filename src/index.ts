#!/usr/bin/env node

import { createProgram } from './cli.js';
import { describeCause } from './utils/errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${describeCause(error)}`);
    process.exit(1);
  });
