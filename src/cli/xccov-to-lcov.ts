/**
 * xccov-to-lcov <xcresult-path> <output-lcov-path>
 *
 * Converts the application target's coverage in an .xcresult archive into an
 * LCOV file. Must run from the repository root unless --repo-root is given.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { runConverter } from '../core/xccov-converter.js';
import { loadConverterConfig, parseList } from '../utils/config-loader.js';
import { XccovClient, type CommandRunner } from '../utils/xccov-client.js';
import { initLogger } from '../utils/logger.js';
import { VERSION } from './shared.js';

interface XccovToLcovOptions {
  targetSuffix?: string;
  alwaysCovered?: string[];
  repoRoot?: string;
  xcrun?: string;
  debug?: boolean;
}

export interface XccovToLcovDependencies {
  runCommand?: CommandRunner;
}

export function createXccovToLcovProgram(dependencies: XccovToLcovDependencies = {}): Command {
  const program = new Command();

  program
    .name('xccov-to-lcov')
    .description('Convert an Xcode .xcresult coverage archive to LCOV')
    .version(VERSION)
    .argument('<xcresult-path>', 'path to the .xcresult archive')
    .argument('<output-lcov-path>', 'LCOV file to write; parent directories are created')
    .option('--target-suffix <suffix>', 'only convert targets whose name ends with this (default: ".app")')
    .option('--always-covered <names>', 'comma-separated file names whose executable lines count as hit', parseList)
    .option('--repo-root <dir>', 'repository root that SF paths are made relative to (default: cwd)')
    .option('--xcrun <path>', 'xcrun executable (default: "xcrun")')
    .option('--debug', 'log diagnostics to stderr')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (xcresultPath: string, outputPath: string, options: XccovToLcovOptions) => {
      const config = loadConverterConfig({
        xcresultPath,
        outputPath,
        appTargetSuffix: options.targetSuffix,
        alwaysCoveredFiles: options.alwaysCovered,
        repoRoot: options.repoRoot === undefined ? undefined : resolve(options.repoRoot),
        xcrunPath: options.xcrun,
        debug: options.debug,
      });
      initLogger(config);

      const client = new XccovClient({ xcrunPath: config.xcrunPath, runCommand: dependencies.runCommand });
      await runConverter(config, client);
    });

  return program;
}
