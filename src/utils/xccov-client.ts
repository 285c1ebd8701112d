/**
 * Thin wrapper around `xcrun xccov view ... --json`
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  XccovFileCoverageSchema,
  XccovReportSchema,
  type XccovLineEntry,
  type XccovReport,
} from '../types/xccov.js';
import { XccovCommandError, XccovOutputError } from '../types/errors.js';
import { debug } from './logger.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 64 * 1024 * 1024; // 64MB

/**
 * Runs a command to completion and resolves with its stdout
 */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export interface XccovClientOptions {
  xcrunPath?: string;
  runCommand?: CommandRunner;
}

function describeFailure(err: unknown): { exitCode: number | null; stderr: string; reason: string } {
  if (!(err instanceof Error)) {
    return { exitCode: null, stderr: '', reason: String(err) };
  }

  const code = 'code' in err ? err.code : undefined;
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';

  return {
    exitCode: typeof code === 'number' ? code : null,
    stderr,
    reason: stderr || err.message,
  };
}

export const runCommand: CommandRunner = async (command, args) => {
  try {
    const { stdout } = await execFileAsync(command, args, {
      encoding: 'utf8',
      maxBuffer: MAX_BUFFER,
    });
    return stdout;
  } catch (err) {
    const commandLine = [command, ...args].join(' ');
    const { exitCode, stderr, reason } = describeFailure(err);
    throw new XccovCommandError(`Command failed: ${commandLine}: ${reason}`, {
      command: commandLine,
      exitCode,
      stderr,
    });
  }
};

export class XccovClient {
  private readonly xcrunPath: string;
  private readonly runCommand: CommandRunner;

  constructor(options: XccovClientOptions = {}) {
    this.xcrunPath = options.xcrunPath ?? 'xcrun';
    this.runCommand = options.runCommand ?? runCommand;
  }

  /**
   * Targets and their files recorded in the archive
   */
  async viewReport(xcresultPath: string): Promise<XccovReport> {
    return this.viewJson(['view', '--report', '--json', xcresultPath], XccovReportSchema);
  }

  /**
   * Per-line execution records of one source file
   */
  async viewFileCoverage(xcresultPath: string, filePath: string): Promise<XccovLineEntry[]> {
    const coverage = await this.viewJson(
      ['view', '--archive', '--file', filePath, '--json', xcresultPath],
      XccovFileCoverageSchema
    );

    // The single key is an archive-internal identifier for the file.
    const [entries] = Object.values(coverage);
    if (!entries) {
      throw new XccovOutputError(`xccov returned no coverage for ${filePath}`);
    }

    return entries;
  }

  private async viewJson<T>(args: string[], schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const xccovArgs = ['xccov', ...args];
    debug(`Running ${this.xcrunPath} ${xccovArgs.join(' ')}`);

    const stdout = await this.runCommand(this.xcrunPath, xccovArgs);

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (err) {
      throw new XccovOutputError(
        `xccov ${args[0]} ${args[1]} produced invalid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new XccovOutputError(`xccov ${args[0]} ${args[1]} produced unexpected JSON: ${issues.join('; ')}`);
    }

    return result.data;
  }
}
