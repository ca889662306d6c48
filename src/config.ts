// Configuration loading for the string analyzer MCP server.
//
// Priority per field: string-analyzer-config.json → env vars → defaults.
// Graceful degradation: a missing or broken source falls through to the next.

import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { AnalyzerConfig } from './types.js';
import {
  DEFAULT_MAX_VALUE_LENGTH, MAX_VALUE_LENGTH_RANGE,
  DEFAULT_JSON_INDENT, JSON_INDENT_RANGE,
  DEFAULT_CRASH_DIR,
} from './thresholds.js';

/** How the config was loaded — path only exists when source is 'file' */
export type ConfigOrigin =
  | { readonly source: 'file'; readonly path: string }
  | { readonly source: 'env' }
  | { readonly source: 'default' };

export interface LoadedConfig {
  readonly config: AnalyzerConfig;
  readonly origin: ConfigOrigin;
}

interface ConfigFile {
  maxValueLength?: unknown;
  jsonIndent?: unknown;
  crashDir?: unknown;
}

const KNOWN_KEYS = new Set<string>(['maxValueLength', 'jsonIndent', 'crashDir']);

const ENV_KEYS = {
  maxValueLength: 'STRING_ANALYZER_MAX_LENGTH',
  jsonIndent: 'STRING_ANALYZER_JSON_INDENT',
  crashDir: 'STRING_ANALYZER_CRASH_DIR',
} as const;

/** Default config file location: next to the package root (one level above src/ or dist/) */
export const DEFAULT_CONFIG_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'string-analyzer-config.json',
);

/** Validate and clamp a numeric setting to a range.
 *  Returns the default if the value is missing, NaN, or out of range. */
export function clampSetting(
  name: string,
  value: unknown,
  defaultValue: number,
  [min, max]: readonly [number, number],
): number {
  if (value === undefined || value === null || value === '') return defaultValue;
  const n = Number(value);
  if (isNaN(n) || n < min || n > max) {
    process.stderr.write(`[string-analyzer-mcp] ${name} out of range [${min}, ${max}]: ${String(value)} — using default ${defaultValue}\n`);
    return defaultValue;
  }
  return Math.round(n);
}

function resolveDir(raw: string): string {
  const expanded = raw
    .replace(/^\$HOME\b/, process.env.HOME ?? '')
    .replace(/^~/, process.env.HOME ?? '');
  return path.resolve(expanded);
}

/** Read the config file. Null when it does not exist or cannot be parsed. */
function readConfigFile(configPath: string): ConfigFile | null {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (error: unknown) {
    // ENOENT = no config file, which is expected — silently fall through
    const isFileNotFound = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!isFileNotFound) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[string-analyzer-mcp] Failed to read ${configPath}: ${message}\n`);
    }
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      process.stderr.write(`[string-analyzer-mcp] Invalid ${path.basename(configPath)}: expected a JSON object\n`);
      return null;
    }
    const file: ConfigFile = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (key === 'maxValueLength') file.maxValueLength = value;
      else if (key === 'jsonIndent') file.jsonIndent = value;
      else if (key === 'crashDir') file.crashDir = value;
      else {
        process.stderr.write(
          `[string-analyzer-mcp] Unknown config key "${key}" — ignored. ` +
          `Valid keys: ${Array.from(KNOWN_KEYS).join(', ')}\n`,
        );
      }
    }
    return file;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[string-analyzer-mcp] Failed to parse ${path.basename(configPath)}: ${message}\n`);
    return null;
  }
}

/** Load config. Both inputs are injectable for tests. */
export function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): LoadedConfig {
  const file = readConfigFile(configPath);
  const pick = (key: keyof typeof ENV_KEYS): unknown => file?.[key] ?? env[ENV_KEYS[key]];

  const rawCrashDir = pick('crashDir');
  const config: AnalyzerConfig = {
    maxValueLength: clampSetting('maxValueLength', pick('maxValueLength'), DEFAULT_MAX_VALUE_LENGTH, MAX_VALUE_LENGTH_RANGE),
    jsonIndent: clampSetting('jsonIndent', pick('jsonIndent'), DEFAULT_JSON_INDENT, JSON_INDENT_RANGE),
    crashDir: typeof rawCrashDir === 'string' && rawCrashDir.length > 0 ? resolveDir(rawCrashDir) : DEFAULT_CRASH_DIR,
  };

  if (file) return { config, origin: { source: 'file', path: configPath } };
  const usedEnv = Object.values(ENV_KEYS).some(key => env[key] !== undefined);
  return { config, origin: usedEnv ? { source: 'env' } : { source: 'default' } };
}
