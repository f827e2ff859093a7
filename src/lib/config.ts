/**
 * Linker configuration
 *
 * Validated with zod so CLI flags, JSON files and programmatic callers all
 * go through the same defaults and bounds.
 */

import path from 'node:path';
import { z } from 'zod';
import { ConfigValidationError } from './errors';
import { parseLogLevel } from './logger';

export const linkerConfigSchema = z.object({
  exhibitsRoot: z.string().min(1, 'exhibitsRoot is required'),
  sanitizeFilenames: z.boolean().default(false),
  fuzzyThreshold: z.number().min(0).max(1).default(0.85),
  fuzzyEpsilon: z.number().min(0).max(1).default(0.02),
  maxPageScanRetries: z.number().int().min(0).max(10).default(3),
  retryBaseDelayMs: z.number().int().min(0).default(100),
  viewer: z.enum(['acrobat', 'chrome']).default('acrobat'),
  batesPrefix: z
    .string()
    .regex(/^[A-Z]+[_-]?$/, 'batesPrefix must be uppercase letters, optionally ending in _ or -')
    .optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type LinkerConfig = z.infer<typeof linkerConfigSchema>;
export type LinkerConfigInput = z.input<typeof linkerConfigSchema>;

/**
 * Validate raw configuration and resolve exhibitsRoot to an absolute path.
 * LOG_LEVEL in the environment applies when no logLevel is given.
 *
 * @throws ConfigValidationError
 */
export function loadConfig(
  input: LinkerConfigInput,
  env: NodeJS.ProcessEnv = process.env
): LinkerConfig {
  const withEnv = {
    ...input,
    logLevel: input.logLevel ?? parseLogLevel(env.LOG_LEVEL),
  };

  const parsed = linkerConfigSchema.safeParse(withEnv);
  if (!parsed.success) {
    throw ConfigValidationError.fromZodError(parsed.error);
  }

  return {
    ...parsed.data,
    exhibitsRoot: path.resolve(parsed.data.exhibitsRoot),
  };
}
