import { z } from 'zod';

/**
 * Shape of `xccov view --report --json`. Only the fields the converter reads
 * are declared; anything else the tool emits passes through untouched.
 */
export const XccovFileSchema = z
  .object({
    path: z.string().default(''),
  })
  .passthrough();

export const XccovTargetSchema = z
  .object({
    name: z.string().default(''),
    files: z.array(XccovFileSchema).default([]),
  })
  .passthrough();

export const XccovReportSchema = z
  .object({
    targets: z.array(XccovTargetSchema).default([]),
  })
  .passthrough();

/**
 * One line of `xccov view --archive --file <path> --json`
 */
export const XccovLineEntrySchema = z
  .object({
    line: z.number().int().nonnegative(),
    isExecutable: z.boolean().default(false),
    executionCount: z.number().int().nonnegative().default(0),
  })
  .passthrough();

export const XccovFileCoverageSchema = z.record(z.array(XccovLineEntrySchema));

export type XccovFile = z.infer<typeof XccovFileSchema>;
export type XccovTarget = z.infer<typeof XccovTargetSchema>;
export type XccovReport = z.infer<typeof XccovReportSchema>;
export type XccovLineEntry = z.infer<typeof XccovLineEntrySchema>;
export type XccovFileCoverage = z.infer<typeof XccovFileCoverageSchema>;
