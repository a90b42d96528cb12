// Config loader: defaults <- YAML file <- environment, then validated as a whole.
// The file is optional unless a path is passed explicitly or named by FIND_FLEX_CONFIG.
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { FlexError, FlexErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { findFlexConfigSchema, type ConfigResult, type FindFlexConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'find-flex.yaml';

export const DEFAULT_CONFIG: FindFlexConfig = {
  required: false,
  minimumVersion: null,
  exactVersion: false,
  quiet: false,
  prefixes: [],
  libraryDirs: [
    '/usr/local/lib',
    '/usr/lib',
    '/usr/lib64',
    '/usr/lib/x86_64-linux-gnu',
    '/usr/lib/aarch64-linux-gnu',
    '/lib',
    '/opt/homebrew/lib',
  ],
  includeDirs: ['/usr/local/include', '/usr/include', '/opt/homebrew/include'],
  hints: { executable: null },
  probeTimeoutMs: 10_000,
};

export function loadConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConfigResult {
  const namedPath = explicitPath ?? env['FIND_FLEX_CONFIG'];
  const configPath = namedPath ? path.resolve(cwd, namedPath) : path.join(cwd, DEFAULT_CONFIG_FILE);

  let fileConfig: Record<string, unknown> = {};
  let usedPath: string | null = null;

  if (existsSync(configPath)) {
    fileConfig = readConfigFile(configPath);
    usedPath = configPath;
  } else if (namedPath) {
    throw new FlexError(FlexErrorCode.INVALID_CONFIG, `Config file not found: ${configPath}`);
  } else {
    logger.debug({ configPath }, 'No config file found, using defaults');
  }

  const merged = applyEnv(deepMerge(toRecord(DEFAULT_CONFIG), fileConfig), env);
  return { config: validateConfig(merged, usedPath), configPath: usedPath };
}

/**
 * Settings handed over in code rather than read from a file. Keys left
 * undefined keep their defaults; the result is checked like a loaded file.
 */
export function resolveConfig(overrides: Partial<FindFlexConfig> = {}): FindFlexConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  return validateConfig(deepMerge(toRecord(DEFAULT_CONFIG), defined));
}

function validateConfig(merged: Record<string, unknown>, source: string | null = null): FindFlexConfig {
  const parsed = findFlexConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new FlexError(
      FlexErrorCode.INVALID_CONFIG,
      `Invalid configuration${source ? ` in ${source}` : ''}:\n${issues.join('\n')}`,
      { issues }
    );
  }
  return parsed.data;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new FlexError(
      FlexErrorCode.INVALID_CONFIG,
      `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  // An empty file parses to null
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new FlexError(FlexErrorCode.INVALID_CONFIG, `${configPath} must contain a mapping at the top level`);
  }
  return parsed;
}

/** FLEX_EXECUTABLE pins the executable, FLEX_ROOT adds a search prefix ahead of the configured ones. */
function applyEnv(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  const executable = env['FLEX_EXECUTABLE'];
  if (executable) {
    const hints = isRecord(result['hints']) ? result['hints'] : {};
    result['hints'] = { ...hints, executable };
  }
  const root = env['FLEX_ROOT'];
  if (root) {
    const prefixes = Array.isArray(result['prefixes']) ? result['prefixes'] : [];
    result['prefixes'] = [root, ...prefixes];
  }
  return result;
}

/** Deep merge b into a (a provides defaults, b overrides). Arrays are replaced, not concatenated. */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(config: FindFlexConfig): Record<string, unknown> {
  return { ...config, hints: { ...config.hints } };
}
