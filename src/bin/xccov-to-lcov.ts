#!/usr/bin/env node
import { createXccovToLcovProgram } from '../cli/xccov-to-lcov.js';
import { exitWithError } from '../cli/shared.js';

createXccovToLcovProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => exitWithError(err));
