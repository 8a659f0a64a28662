/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from gridtrend.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';

export const OutputFormatSchema = z.enum(['json', 'table', 'csv']);

export const FileConfigSchema = z
  .object({
    output: z
      .object({
        format: OutputFormatSchema.optional(),
      })
      .strict()
      .optional(),
    coordinates: z
      .object({
        lon: z.string().min(1).optional(),
        lat: z.string().min(1).optional(),
        time: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

let cachedConfig: FileConfig | null = null;

/**
 * Load configuration from a YAML file.
 *
 * A missing file is not an error; a file that exists but does not parse or
 * does not match the schema is.
 */
export function loadConfigFromYaml(configPath?: string): FileConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const path = configPath || process.env.GRIDTREND_CONFIG || join(process.cwd(), 'gridtrend.yaml');

  if (!existsSync(path)) {
    logger.debug('gridtrend.yaml not found, using environment variables only', { path });
    cachedConfig = {};
    return cachedConfig;
  }

  let content: unknown;
  try {
    content = load(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
      'GRIDTREND_CONFIG',
      { path }
    );
  }

  const parsed = FileConfigSchema.safeParse(content ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${path}`, 'GRIDTREND_CONFIG', {
      path,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  logger.info('Loaded configuration from gridtrend.yaml', { path });
  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
