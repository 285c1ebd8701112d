/**
 * Types for the LCOV subset shared by both tools
 */

export interface LcovLineRecord {
  line: number;
  hits: number;
}

export interface LcovSection {
  testName?: string;
  sourceFile: string;
  lines: LcovLineRecord[];
}

export interface LineCoverageSummary {
  total: number;
  covered: number;
  percentage: number;
}
