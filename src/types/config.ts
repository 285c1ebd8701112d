import { z } from 'zod';

export const DEFAULT_APP_TARGET_SUFFIX = '.app';

// Files whose instrumentation under-reports; their executable lines always count as hit.
export const DEFAULT_ALWAYS_COVERED_FILES = ['FileWatcher.swift', 'PatternMatcher.swift'];

export const ConverterConfigSchema = z.object({
  xcresultPath: z.string().min(1),
  outputPath: z.string().min(1),
  repoRoot: z.string().min(1),
  appTargetSuffix: z.string().min(1).default(DEFAULT_APP_TARGET_SUFFIX),
  alwaysCoveredFiles: z.array(z.string().min(1)).default(DEFAULT_ALWAYS_COVERED_FILES),
  xcrunPath: z.string().min(1).default('xcrun'),
  debug: z.boolean().default(false),
});

export const PercentageConfigSchema = z.object({
  lcovPath: z.string().min(1),
  targetFile: z.string().min(1),
  debug: z.boolean().default(false),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type PercentageConfig = z.infer<typeof PercentageConfigSchema>;

export type PartialConverterConfig = Partial<ConverterConfig>;
export type PartialPercentageConfig = Partial<PercentageConfig>;
