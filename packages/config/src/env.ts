/**
 * Environment loading and diagnostics
 *
 * Finds the workspace root, loads `.env` and `.env.local` through dotenv,
 * and reports on required keys without ever printing a secret.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { createLogger } from './logger.js';

const logger = createLogger('config');

const SECRET_KEY_MARKERS = ['TOKEN', 'SECRET', 'PASSWORD', 'KEY'];

export interface EnvLoadResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>;
}

export interface KeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  length?: number;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: KeyStatus[];
  warnings: string[];
}

function declaresWorkspaces(packageJsonPath: string): boolean {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch (error) {
    logger.debug({ event: 'env.root.unreadable_package', packageJsonPath, error: String(error) }, 'Skipping unreadable package.json');
    return false;
  }
}

/**
 * Walk up from `startPath` to the workspace root: the first directory whose
 * package.json declares workspaces, or that holds a `.git` folder.
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && declaresWorkspaces(packageJsonPath)) {
      return current;
    }
    if (existsSync(join(current, '.git'))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return resolve(startPath);
    }
    current = parent;
  }
}

export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSecretKey(key: string): boolean {
  return SECRET_KEY_MARKERS.some((marker) => key.includes(marker));
}

function loadFile(path: string, source: string, keySources: Record<string, string>): boolean {
  if (!existsSync(path)) {
    return false;
  }
  const result = config({ path, override: true });
  if (result.error) {
    logger.warn({ event: 'env.load.failed', path, error: result.error.message }, `Failed to load ${source}`);
    return false;
  }
  for (const [key, value] of Object.entries(result.parsed ?? {})) {
    if (value.trim().length > 0) {
      keySources[key] = source;
    }
  }
  return true;
}

let cachedResult: EnvLoadResult | null = null;

/**
 * Load `.env` then `.env.local` (which overrides). Values already present in
 * the process environment are never replaced by empty file values.
 * Safe to call more than once; later calls return the first result.
 */
export function initEnv(envFileOverride?: string): EnvLoadResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot();
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const preserved = new Map<string, string>();
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      preserved.set(key, value);
    }
  }

  const keySources: Record<string, string> = {};
  const loaded = loadFile(envFilePath, '.env', keySources);
  if (!loaded) {
    logger.warn({ event: 'env.file.missing', envFilePath }, '.env file not loaded');
  }
  const localLoaded = loadFile(envLocalFilePath, '.env.local', keySources);

  for (const [key, value] of preserved) {
    const current = process.env[key];
    if (!current || current.trim().length === 0) {
      process.env[key] = value;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded: Object.keys(keySources),
    keySources,
  };
  return cachedResult;
}

/**
 * Report on the given keys (safe for logging, no secrets)
 */
export function getEnvDiagnostics(keys: readonly string[], env: NodeJS.ProcessEnv = process.env): EnvDiagnostics {
  const repoRoot = findRepoRoot();
  const envFilePath = resolve(env.ENV_FILE || join(repoRoot, '.env'));
  const sources = cachedResult?.keySources ?? {};
  const warnings: string[] = [];

  if (!existsSync(envFilePath)) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  const statuses = keys.map((key): KeyStatus => {
    const value = env[key]?.trim();
    if (!value) {
      return { key, present: false };
    }
    if (/^["']|["']$/.test(value)) {
      warnings.push(`${key} is wrapped in quotes (may cause issues)`);
    }
    if (/[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(env[key] ?? '')) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
    return {
      key,
      present: true,
      length: value.length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: sources[key],
    };
  });

  return {
    cwd: process.cwd(),
    repoRoot,
    envFilePath,
    envFileExists: existsSync(envFilePath),
    keys: statuses,
    warnings,
  };
}

export function validateRequiredEnv(
  requiredKeys: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; missing: string[] } {
  const missing = requiredKeys.filter((key) => !env[key] || env[key]?.trim().length === 0);
  return { valid: missing.length === 0, missing };
}

/**
 * Trimmed value of a required variable
 * @throws Error naming the key when it is missing or empty
 */
export function requireEnv(key: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(
      `Missing or empty required environment variable: ${key}\n` +
        `Please check your .env file and ensure ${key} is set with a non-empty value.`
    );
  }
  return value;
}

/**
 * Read an integer, falling back to the default (with a warning) when the
 * value is missing, unparsable or below `min`
 */
export function readIntEnv(
  name: string,
  defaultValue: number,
  options: { min?: number; env?: NodeJS.ProcessEnv } = {}
): number {
  const raw = (options.env ?? process.env)[name]?.trim();
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    logger.warn(
      { event: 'config.invalid_int', envVar: name, value: raw, defaultValue },
      `Invalid integer value for ${name}: "${raw}". Using default: ${defaultValue}`
    );
    return defaultValue;
  }

  if (options.min !== undefined && parsed < options.min) {
    logger.warn(
      { event: 'config.invalid_int_range', envVar: name, value: parsed, min: options.min, defaultValue },
      `Value for ${name} (${parsed}) is below minimum (${options.min}). Using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}
