import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import logger from '../utils/logger';
import { ConfigError, errorMessage } from '../utils/errors';
import { BUILTIN_DEFAULT_VALUES } from '../services/standards/fieldRegistry';
import type { PerformanceSettings, SubmissionConfig } from '../types/metadata';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export const DEFAULT_PERFORMANCE: Readonly<PerformanceSettings> = {
  batch_size: 10,
  max_workers: 10,
  enable_checkpoints: true,
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringMap(value: unknown, section: string): Record<string, string> {
  const out: Record<string, string> = {};
  if (value === undefined) return out;
  if (!isPlainObject(value)) {
    logger.warn(`Ignoring config section '${section}': expected an object`);
    return out;
  }
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string') {
      out[key] = raw;
    } else if (typeof raw === 'number') {
      out[key] = String(raw);
    } else {
      logger.warn(`Ignoring ${section}.${key}: expected a string or number`);
    }
  }
  return out;
}

function positiveInt(value: unknown): number | undefined {
  const num = typeof value === 'string' ? Number(value) : value;
  return typeof num === 'number' && Number.isInteger(num) && num > 0 ? num : undefined;
}

function readPerformance(value: unknown, env: NodeJS.ProcessEnv): PerformanceSettings {
  const section = isPlainObject(value) ? value : {};
  return {
    batch_size: positiveInt(env.SUBMISSION_BATCH_SIZE) ?? positiveInt(section.batch_size) ?? DEFAULT_PERFORMANCE.batch_size,
    max_workers: positiveInt(env.SUBMISSION_MAX_WORKERS) ?? positiveInt(section.max_workers) ?? DEFAULT_PERFORMANCE.max_workers,
    enable_checkpoints:
      typeof section.enable_checkpoints === 'boolean' ? section.enable_checkpoints : DEFAULT_PERFORMANCE.enable_checkpoints,
  };
}

/**
 * Build a config from an already-parsed JSON value, layering `default_values`
 * over the built-in archive defaults.
 */
export function buildSubmissionConfig(raw: unknown = {}, env: NodeJS.ProcessEnv = process.env): SubmissionConfig {
  if (!isPlainObject(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }
  return {
    default_values: { ...BUILTIN_DEFAULT_VALUES, ...toStringMap(raw.default_values, 'default_values') },
    contact: toStringMap(raw.contact, 'contact'),
    performance: readPerformance(raw.performance, env),
  };
}

/**
 * Load the submission config file. A missing file falls back to the built-in defaults.
 */
export function loadSubmissionConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): SubmissionConfig {
  if (!configPath) {
    return buildSubmissionConfig({}, env);
  }
  if (!fs.existsSync(configPath)) {
    logger.warn(`Config file not found: ${configPath}, using built-in defaults`);
    return buildSubmissionConfig({}, env);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${configPath}: ${errorMessage(error)}`);
  }

  const config = buildSubmissionConfig(parsed, env);
  logger.info(`Loaded configuration from ${configPath}`);
  return config;
}
