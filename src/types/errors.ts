export class XcresultLcovError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XcresultLcovError';
  }
}

export class MissingInputError extends XcresultLcovError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'MissingInputError';
    this.path = path;
  }
}

export class LcovParseError extends XcresultLcovError {
  readonly lineNumber: number;

  constructor(message: string, lineNumber: number) {
    super(`${message} (line ${lineNumber})`);
    this.name = 'LcovParseError';
    this.lineNumber = lineNumber;
  }
}

export class XccovCommandError extends XcresultLcovError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    options: {
      command: string;
      exitCode?: number | null;
      stderr?: string;
    }
  ) {
    super(message);
    this.name = 'XccovCommandError';
    this.command = options.command;
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';
  }
}

export class XccovOutputError extends XcresultLcovError {
  constructor(message: string) {
    super(message);
    this.name = 'XccovOutputError';
  }
}

export class ConfigError extends XcresultLcovError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
