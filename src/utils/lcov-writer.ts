import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { LcovSection } from '../types/lcov.js';

export function formatLcovSection(section: LcovSection): string[] {
  const lines: string[] = [];

  if (section.testName !== undefined) {
    lines.push(`TN:${section.testName}`);
  }
  lines.push(`SF:${section.sourceFile}`);
  for (const record of section.lines) {
    lines.push(`DA:${record.line},${record.hits}`);
  }
  lines.push('end_of_record');

  return lines;
}

/**
 * Render sections as LCOV text, newline-terminated
 */
export function formatLcov(sections: LcovSection[]): string {
  return sections.flatMap(formatLcovSection).join('\n') + '\n';
}

/**
 * Write sections to `outputPath`, creating parent directories as needed
 */
export async function writeLcovReport(outputPath: string, sections: LcovSection[]): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, formatLcov(sections), 'utf-8');
}
