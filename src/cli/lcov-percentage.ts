/**
 * lcov-percentage <lcov-path> <target-file>
 *
 * Prints the line coverage of one file, e.g. `87.50`, and nothing else on stdout.
 */

import { Command } from 'commander';
import { coverageForFile, formatPercentage } from '../core/coverage-percentage.js';
import { loadPercentageConfig } from '../utils/config-loader.js';
import { initLogger } from '../utils/logger.js';
import { VERSION } from './shared.js';

interface LcovPercentageOptions {
  debug?: boolean;
}

export function createLcovPercentageProgram(): Command {
  const program = new Command();

  program
    .name('lcov-percentage')
    .description('Print the line coverage percentage of one file from an LCOV report')
    .version(VERSION)
    .argument('<lcov-path>', 'LCOV report to read')
    .argument('<target-file>', 'file to measure, matched against the end of each SF path')
    .option('--debug', 'log diagnostics to stderr')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (lcovPath: string, targetFile: string, options: LcovPercentageOptions) => {
      const config = loadPercentageConfig({ lcovPath, targetFile, debug: options.debug });
      initLogger(config);

      const percentage = await coverageForFile(config.lcovPath, config.targetFile);
      console.log(formatPercentage(percentage));
    });

  return program;
}
