/**
 * Configuration loader for romcat
 * Optional YAML file with environment variable expansion, overridden by CLI flags.
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import { ConfigurationError, errorMessage } from './errors.js';
import type { RunConfig } from './types.js';

export const DEFAULT_THRESHOLD = 90;
export const DEFAULT_CANDIDATE_LIMIT = 6;
export const DEFAULT_OUTPUT = './gamelist_generated.xml';
export const DEFAULT_ALIAS_FILE = 'aliases.json';
export const DEFAULT_COLUMNS = { alternate: 'name cn', canonical: 'name en' };

/** Shape of the YAML file and of CLI overrides — everything optional. */
export interface RawConfig {
  catalogDirectory?: unknown;
  system?: unknown;
  confidenceThreshold?: unknown;
  outputPath?: unknown;
  sequenceAware?: unknown;
  candidateLimit?: unknown;
  aliasFile?: unknown;
  columns?: { alternate?: unknown; canonical?: unknown };
  logDirectory?: unknown;
}

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Find config file from multiple candidate locations
 */
export function findConfigFile(explicit?: string, cwd: string = process.cwd()): string | null {
  if (explicit) {
    if (!fs.existsSync(explicit)) {
      throw new ConfigurationError(`Config file not found: ${explicit}`);
    }
    return explicit;
  }

  const candidates = [
    process.env.ROMCAT_CONFIG,
    path.join(cwd, 'romcat.yaml'),
    path.join(cwd, 'config/romcat.yaml'),
  ].filter((c): c is string => Boolean(c));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Read and env-expand a YAML config file. Returns {} when no file is present.
 */
export function readConfigFile(filePath: string | null): RawConfig {
  if (!filePath) return {};

  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read config ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  if (parsed == null) return {};

  const expanded = deepExpand(parsed);
  if (!isRecord(expanded)) {
    throw new ConfigurationError(`Config ${filePath} must be a YAML mapping`);
  }

  const columns = expanded.columns;
  return {
    ...expanded,
    columns: isRecord(columns) ? columns : undefined,
  };
}

function pickString(key: string, value: unknown, fallback: string): string {
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${key} must be a non-empty string`);
  }
  return value;
}

function pickInteger(key: string, value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isInteger(n)) {
    throw new ConfigurationError(`${key} must be an integer, got ${JSON.stringify(value)}`);
  }
  return n;
}

function pickBoolean(key: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${key} must be true or false`);
  }
  return value;
}

export function validateThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 0 || threshold > 100) {
    throw new ConfigurationError(`confidenceThreshold must be an integer between 0 and 100, got ${threshold}`);
  }
}

/**
 * Merge file values and CLI overrides (overrides win) into a validated RunConfig.
 */
export function resolveConfig(file: RawConfig, overrides: RawConfig): RunConfig {
  const pick = <K extends keyof RawConfig>(key: K): RawConfig[K] => overrides[key] ?? file[key];

  const system = pickString('system', pick('system'), '');
  if (!system) {
    throw new ConfigurationError('system is required (e.g. `romcat match snes`)');
  }

  const confidenceThreshold = pickInteger('confidenceThreshold', pick('confidenceThreshold'), DEFAULT_THRESHOLD);
  validateThreshold(confidenceThreshold);

  const candidateLimit = pickInteger('candidateLimit', pick('candidateLimit'), DEFAULT_CANDIDATE_LIMIT);
  if (candidateLimit < 1) {
    throw new ConfigurationError(`candidateLimit must be at least 1, got ${candidateLimit}`);
  }

  const logDirectory = pick('logDirectory');

  return {
    catalogDirectory: pickString('catalogDirectory', pick('catalogDirectory'), '.'),
    system,
    confidenceThreshold,
    outputPath: pickString('outputPath', pick('outputPath'), DEFAULT_OUTPUT),
    sequenceAware: pickBoolean('sequenceAware', pick('sequenceAware'), false),
    candidateLimit,
    aliasFile: pickString('aliasFile', pick('aliasFile'), DEFAULT_ALIAS_FILE),
    columns: {
      alternate: pickString(
        'columns.alternate',
        overrides.columns?.alternate ?? file.columns?.alternate,
        DEFAULT_COLUMNS.alternate
      ),
      canonical: pickString(
        'columns.canonical',
        overrides.columns?.canonical ?? file.columns?.canonical,
        DEFAULT_COLUMNS.canonical
      ),
    },
    logDirectory: logDirectory == null || logDirectory === '' ? undefined : pickString('logDirectory', logDirectory, ''),
  };
}

/**
 * Load config file (if any) and apply CLI overrides
 */
export function loadConfig(overrides: RawConfig, configPath?: string): RunConfig {
  return resolveConfig(readConfigFile(findConfigFile(configPath)), overrides);
}
