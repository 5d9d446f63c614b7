import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import {
  assertValidWeights,
  CATALOG_KEYS,
  defaultTimezone,
  normalizeInstrument,
  WeightConfigurationError,
} from '../levels/catalog.js';
import { isValidTimeZone } from './timezone.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.levelbias', 'config.yaml');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const WeightMapSchema = z.record(z.string(), z.number());

const ConfigSchema = z.object({
  engine: z
    .object({
      defaultInstrument: z.string().default('US100'),
      fallbackPolicy: z.enum(['latest', 'omit']).default('latest'),
      timezones: z
        .record(
          z.string(),
          z.string().refine(isValidTimeZone, { message: 'Unknown IANA timezone' })
        )
        .default({}),
    })
    .default({}),
  weights: z
    .object({
      US100: WeightMapSchema.optional(),
      ES: WeightMapSchema.optional(),
      UK100: WeightMapSchema.optional(),
    })
    .default({}),
  memory: z
    .object({
      dbPath: z.string().optional(),
    })
    .default({}),
  cache: z
    .object({
      enabled: z.boolean().default(true),
      retentionDays: z.number().int().positive().default(30),
    })
    .default({}),
  predictions: z
    .object({
      autoSave: z.boolean().default(true),
      historyLimit: z.number().int().positive().default(20),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type LevelBiasConfig = z.infer<typeof ConfigSchema>;

/** Validate a parsed YAML document. Configured weight maps must be complete. */
export function parseConfig(raw: unknown): LevelBiasConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const cfg = result.data;
  cfg.engine.timezones = Object.fromEntries(
    Object.entries(cfg.engine.timezones).map(([code, zone]) => [normalizeInstrument(code), zone])
  );

  for (const key of CATALOG_KEYS) {
    const weights = cfg.weights[key];
    if (!weights) continue;
    try {
      assertValidWeights(key, weights);
    } catch (err) {
      if (err instanceof WeightConfigurationError) {
        throw new ConfigError(`Invalid weights for ${key}: ${err.message}`);
      }
      throw err;
    }
  }

  if (cfg.memory.dbPath) {
    cfg.memory.dbPath = expandHome(cfg.memory.dbPath);
  }
  return cfg;
}

export function loadConfig(configPath?: string): LevelBiasConfig {
  const explicit = configPath ?? process.env.LEVELBIAS_CONFIG_PATH;
  const path = expandHome(explicit ?? DEFAULT_CONFIG_PATH);

  if (!explicit && !existsSync(path)) {
    return parseConfig({});
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${path}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse config file ${path}: ${reason}`);
  }
  return parseConfig(parsed);
}

/** Configured timezone for an instrument, else its default. */
export function resolveTimezone(instrument: string, config: LevelBiasConfig): string {
  const key = normalizeInstrument(instrument);
  return config.engine.timezones[key] ?? defaultTimezone(key);
}
