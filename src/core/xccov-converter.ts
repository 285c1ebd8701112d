/**
 * Convert an .xcresult coverage archive into LCOV sections
 */

import { existsSync } from 'fs';
import { posix, resolve } from 'path';
import type { ConverterConfig } from '../types/config.js';
import type { LcovLineRecord, LcovSection } from '../types/lcov.js';
import type { XccovLineEntry } from '../types/xccov.js';
import { MissingInputError } from '../types/errors.js';
import { XccovClient } from '../utils/xccov-client.js';
import { writeLcovReport } from '../utils/lcov-writer.js';
import { relativeToRoot } from '../utils/paths.js';
import { debug, success } from '../utils/logger.js';

export type ConvertOptions = Pick<
  ConverterConfig,
  'xcresultPath' | 'repoRoot' | 'appTargetSuffix' | 'alwaysCoveredFiles'
>;

export function toLineRecords(entries: XccovLineEntry[], alwaysCovered: boolean): LcovLineRecord[] {
  return entries
    .filter(entry => entry.isExecutable)
    .map(entry => ({
      line: entry.line,
      hits: alwaysCovered ? Math.max(entry.executionCount, 1) : entry.executionCount,
    }));
}

/**
 * Build one LCOV section per source file of the application target(s).
 * Files missing on disk or outside the repository root are skipped.
 */
export async function convertXcresultToLcov(options: ConvertOptions, client: XccovClient): Promise<LcovSection[]> {
  const report = await client.viewReport(options.xcresultPath);
  const sections: LcovSection[] = [];

  for (const target of report.targets) {
    if (!target.name.endsWith(options.appTargetSuffix)) {
      debug(`Skipping target ${target.name || '<unnamed>'}`);
      continue;
    }

    for (const file of target.files) {
      if (!existsSync(file.path)) {
        debug(`Skipping ${file.path}: no longer exists`);
        continue;
      }

      const relativePath = relativeToRoot(file.path, options.repoRoot);
      if (relativePath === null) {
        debug(`Skipping ${file.path}: outside ${options.repoRoot}`);
        continue;
      }

      const entries = await client.viewFileCoverage(options.xcresultPath, file.path);
      const alwaysCovered = options.alwaysCoveredFiles.includes(posix.basename(relativePath));

      sections.push({
        testName: target.name,
        sourceFile: relativePath,
        lines: toLineRecords(entries, alwaysCovered),
      });
    }
  }

  return sections;
}

/**
 * Convert the archive named in `config` and write the LCOV report
 */
export async function runConverter(
  config: ConverterConfig,
  client: XccovClient = new XccovClient({ xcrunPath: config.xcrunPath })
): Promise<LcovSection[]> {
  const xcresultPath = resolve(config.xcresultPath);
  if (!existsSync(xcresultPath)) {
    throw new MissingInputError(`xcresult not found at ${xcresultPath}`, xcresultPath);
  }

  const sections = await convertXcresultToLcov({ ...config, xcresultPath }, client);
  await writeLcovReport(config.outputPath, sections);

  success(`Wrote ${sections.length} LCOV record(s) to ${config.outputPath}`);
  return sections;
}
