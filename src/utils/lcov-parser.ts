/**
 * Parser for the LCOV subset: TN, SF, DA and end_of_record
 */

import type { LcovLineRecord, LcovSection } from '../types/lcov.js';
import { LcovParseError } from '../types/errors.js';
import { normalizeReportPath } from './paths.js';

const NON_NEGATIVE_INTEGER = /^\d+$/;

export function splitReportLines(content: string): string[] {
  return content.split(/\r?\n/).map(line => line.trim());
}

/**
 * Parse the value of a `DA:` record (`<line>,<hits>[,<checksum>]`)
 */
export function parseDataRecord(value: string, lineNumber: number): LcovLineRecord {
  const [line, hits] = value.split(',');

  if (line === undefined || hits === undefined) {
    throw new LcovParseError(`Malformed DA record "DA:${value}"`, lineNumber);
  }

  const trimmedLine = line.trim();
  const trimmedHits = hits.trim();
  if (!NON_NEGATIVE_INTEGER.test(trimmedLine) || !NON_NEGATIVE_INTEGER.test(trimmedHits)) {
    throw new LcovParseError(`Malformed DA record "DA:${value}"`, lineNumber);
  }

  return {
    line: parseInt(trimmedLine, 10),
    hits: parseInt(trimmedHits, 10),
  };
}

/**
 * Parse an LCOV report into its sections. Source paths are normalized;
 * data records outside a section are dropped.
 */
export function parseLcov(content: string): LcovSection[] {
  const sections: LcovSection[] = [];
  let current: LcovSection | null = null;
  let pendingTestName: string | undefined;

  for (const [index, line] of splitReportLines(content).entries()) {
    if (line.startsWith('TN:')) {
      pendingTestName = line.slice(3);
    } else if (line.startsWith('SF:')) {
      if (current) {
        sections.push(current);
      }
      current = { sourceFile: normalizeReportPath(line.slice(3)), lines: [] };
      if (pendingTestName !== undefined) {
        current.testName = pendingTestName;
        pendingTestName = undefined;
      }
    } else if (line.startsWith('DA:') && current) {
      current.lines.push(parseDataRecord(line.slice(3), index + 1));
    } else if (line === 'end_of_record' && current) {
      sections.push(current);
      current = null;
    }
  }

  if (current) {
    sections.push(current);
  }

  return sections;
}
