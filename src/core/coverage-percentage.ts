/**
 * Line coverage of a single file from an LCOV report
 */

import { readFile } from 'fs/promises';
import type { LcovLineRecord, LineCoverageSummary } from '../types/lcov.js';
import { parseDataRecord, splitReportLines } from '../utils/lcov-parser.js';
import { normalizeReportPath } from '../utils/paths.js';
import { debug } from '../utils/logger.js';

/**
 * Summarize hit counts. A file with no tracked lines counts as fully covered.
 */
export function summarizeLines(records: LcovLineRecord[]): LineCoverageSummary {
  const total = records.length;
  const covered = records.filter(record => record.hits > 0).length;

  return {
    total,
    covered,
    percentage: total > 0 ? (covered / total) * 100 : 100,
  };
}

export function formatPercentage(percentage: number): string {
  return percentage.toFixed(2);
}

/**
 * Collect the DA records of every section whose source path ends with
 * `target`. Records of other files are not parsed.
 */
export function collectFileRecords(content: string, target: string): LcovLineRecord[] {
  const normalizedTarget = normalizeReportPath(target);
  const records: LcovLineRecord[] = [];
  let currentFile: string | null = null;

  for (const [index, line] of splitReportLines(content).entries()) {
    if (line.startsWith('SF:')) {
      currentFile = normalizeReportPath(line.slice(3));
    } else if (line.startsWith('DA:') && currentFile !== null) {
      if (!currentFile.endsWith(normalizedTarget)) {
        continue;
      }
      records.push(parseDataRecord(line.slice(3), index + 1));
    }
  }

  return records;
}

export function summarizeFileCoverage(content: string, target: string): LineCoverageSummary {
  return summarizeLines(collectFileRecords(content, target));
}

/**
 * Percentage (0-100) of executable lines of `target` hit at least once
 */
export async function coverageForFile(lcovPath: string, target: string): Promise<number> {
  const content = await readFile(lcovPath, 'utf-8');
  const summary = summarizeFileCoverage(content, target);

  debug(`${target}: ${summary.covered}/${summary.total} line(s) covered`);

  return summary.percentage;
}
