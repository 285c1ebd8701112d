import { error, isDebug } from '../utils/logger.js';

export const VERSION = '0.1.0';

/**
 * Report an error that ended a run and exit with status 1
 */
export function exitWithError(err: unknown): never {
  error(err instanceof Error ? err.message : String(err));
  if (isDebug() && err instanceof Error && err.stack) {
    error(err.stack);
  }
  process.exit(1);
}
