import type { ConverterConfig } from '../types/config.js';

let debugMode = false;
let jsonMode = false;

export function initLogger(config: Partial<Pick<ConverterConfig, 'debug'>>): void {
  debugMode = config.debug ?? process.env.XCRESULT_LCOV_DEBUG === 'true';
  jsonMode = process.env.XCRESULT_LCOV_OUTPUT === 'json';
}

export function isDebug(): boolean {
  return debugMode;
}

export function info(message: string, ...args: unknown[]): void {
  if (jsonMode) {
    console.log(JSON.stringify({ level: 'info', message, ...args }));
  } else {
    console.log(`[xcresult-lcov] ${message}`, ...args);
  }
}

// Diagnostics go to stderr: stdout of lcov-percentage is the result itself.
export function debug(message: string, ...args: unknown[]): void {
  if (debugMode) {
    if (jsonMode) {
      console.error(JSON.stringify({ level: 'debug', message, ...args }));
    } else {
      console.error(`[xcresult-lcov:debug] ${message}`, ...args);
    }
  }
}

export function warn(message: string, ...args: unknown[]): void {
  if (jsonMode) {
    console.warn(JSON.stringify({ level: 'warn', message, ...args }));
  } else {
    console.warn(`[xcresult-lcov] ⚠ ${message}`, ...args);
  }
}

export function error(message: string, ...args: unknown[]): void {
  if (jsonMode) {
    console.error(JSON.stringify({ level: 'error', message, ...args }));
  } else {
    console.error(`[xcresult-lcov] ✗ ${message}`, ...args);
  }
}

export function success(message: string, ...args: unknown[]): void {
  if (jsonMode) {
    console.log(JSON.stringify({ level: 'success', message, ...args }));
  } else {
    console.log(`[xcresult-lcov] ✓ ${message}`, ...args);
  }
}
