import type { ZodType, ZodTypeDef } from 'zod';
import {
  ConverterConfigSchema,
  PercentageConfigSchema,
  type ConverterConfig,
  type PartialConverterConfig,
  type PartialPercentageConfig,
  type PercentageConfig,
} from '../types/config.js';
import { ConfigError } from '../types/errors.js';

/**
 * Split a comma-separated environment value, dropping empty items
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function withoutUndefined(values: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function debugFromEnv(): boolean | undefined {
  const value = process.env.XCRESULT_LCOV_DEBUG;
  return value === undefined ? undefined : value === 'true';
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Resolve converter settings. Precedence: explicit values (CLI flags), then
 * environment variables, then schema defaults.
 */
export function loadConverterConfig(overrides: PartialConverterConfig): ConverterConfig {
  const config: PartialConverterConfig = {
    repoRoot: process.cwd(),
    debug: debugFromEnv(),
  };

  if (process.env.XCRESULT_LCOV_TARGET_SUFFIX) {
    config.appTargetSuffix = process.env.XCRESULT_LCOV_TARGET_SUFFIX;
  }

  if (process.env.XCRESULT_LCOV_ALWAYS_COVERED !== undefined) {
    config.alwaysCoveredFiles = parseList(process.env.XCRESULT_LCOV_ALWAYS_COVERED);
  }

  if (process.env.XCRESULT_LCOV_XCRUN) {
    config.xcrunPath = process.env.XCRESULT_LCOV_XCRUN;
  }

  return validate(ConverterConfigSchema, { ...withoutUndefined(config), ...withoutUndefined(overrides) });
}

export function loadPercentageConfig(overrides: PartialPercentageConfig): PercentageConfig {
  const config: PartialPercentageConfig = { debug: debugFromEnv() };

  return validate(PercentageConfigSchema, { ...withoutUndefined(config), ...withoutUndefined(overrides) });
}
