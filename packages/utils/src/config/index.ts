/**
 * Configuration loading
 *
 * Settings come from, in order of precedence: explicit overrides (CLI flags),
 * gridtrend.yaml, environment variables, defaults. The calendar policy is
 * deliberately absent: it must always be given by the caller.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml, OutputFormatSchema, type FileConfig } from './yaml-config.js';

export { loadConfigFromYaml, clearConfigCache, FileConfigSchema, OutputFormatSchema } from './yaml-config.js';
export type { FileConfig } from './yaml-config.js';

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export interface CoordinateNames {
  lon: string;
  lat: string;
  time: string;
}

export interface GridSettings {
  format: OutputFormat;
  coordinates: CoordinateNames;
}

export interface SettingsOverrides {
  format?: OutputFormat;
  coordinates?: Partial<CoordinateNames>;
}

export const DEFAULT_SETTINGS: GridSettings = {
  format: 'table',
  coordinates: { lon: 'lon', lat: 'lat', time: 'time' },
};

/**
 * Load settings from environment variables
 */
export function getEnvSettings(env: NodeJS.ProcessEnv = process.env): SettingsOverrides {
  const { GRIDTREND_FORMAT, GRIDTREND_LON_NAME, GRIDTREND_LAT_NAME, GRIDTREND_TIME_NAME } = env;

  let format: OutputFormat | undefined;
  if (GRIDTREND_FORMAT) {
    const parsed = OutputFormatSchema.safeParse(GRIDTREND_FORMAT);
    if (!parsed.success) {
      throw new ConfigurationError(
        `GRIDTREND_FORMAT must be one of json, table, csv (got '${GRIDTREND_FORMAT}')`,
        'GRIDTREND_FORMAT'
      );
    }
    format = parsed.data;
  }

  return {
    format,
    coordinates: {
      lon: GRIDTREND_LON_NAME || undefined,
      lat: GRIDTREND_LAT_NAME || undefined,
      time: GRIDTREND_TIME_NAME || undefined,
    },
  };
}

function fromFile(config: FileConfig): SettingsOverrides {
  return {
    format: config.output?.format,
    coordinates: config.coordinates,
  };
}

/**
 * Resolve effective settings. Later layers win over earlier ones.
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  layers: { file?: FileConfig; env?: NodeJS.ProcessEnv } = {}
): GridSettings {
  const ordered: SettingsOverrides[] = [
    getEnvSettings(layers.env),
    fromFile(layers.file ?? loadConfigFromYaml()),
    overrides,
  ];

  const settings: GridSettings = {
    format: DEFAULT_SETTINGS.format,
    coordinates: { ...DEFAULT_SETTINGS.coordinates },
  };

  for (const layer of ordered) {
    if (layer.format) {
      settings.format = layer.format;
    }
    const names = layer.coordinates ?? {};
    if (names.lon) settings.coordinates.lon = names.lon;
    if (names.lat) settings.coordinates.lat = names.lat;
    if (names.time) settings.coordinates.time = names.time;
  }

  return settings;
}
