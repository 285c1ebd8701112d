#!/usr/bin/env node
import { createLcovPercentageProgram } from '../cli/lcov-percentage.js';
import { exitWithError } from '../cli/shared.js';

createLcovPercentageProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => exitWithError(err));
