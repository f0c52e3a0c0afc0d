#!/usr/bin/env node
import { formatError } from './convert/errors.js';
import { buildProgram } from './program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exit(1);
  });
