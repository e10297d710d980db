/**
 * Configuration loading
 * Reads an optional JSON file and applies environment overrides
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { concurrentStrategy, EditStrategy, sequentialStrategy } from './strategy.js';
import { ConfigError } from './types.js';

export type LineSeparatorName = 'lf' | 'crlf' | 'cr' | 'os';

export interface ServerConfig {
  /** Directory relative file paths resolve against */
  baseDir: string;

  /** Separator used when rendering edited text */
  lineSeparator: string;

  /** Maximum concurrent section edits, 0 for sequential editing */
  concurrency: number;
}

const DEFAULT_CONFIG_FILE = 'section-editor.json';

const LINE_SEPARATORS: Record<LineSeparatorName, string> = {
  lf: '\n',
  crlf: '\r\n',
  cr: '\r',
  os: os.EOL,
};

interface RawConfig {
  baseDir?: unknown;
  lineSeparator?: unknown;
  concurrency?: unknown;
}

function isLineSeparatorName(value: unknown): value is LineSeparatorName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LINE_SEPARATORS, value);
}

/**
 * Resolve a line separator name to the separator itself
 *
 * @throws {ConfigError} When the name is unknown
 */
export function resolveLineSeparator(value: unknown): string {
  if (!isLineSeparatorName(value)) {
    throw new ConfigError(
      `Invalid lineSeparator: ${String(value)}. Must be one of: ${Object.keys(LINE_SEPARATORS).join(', ')}`
    );
  }
  return LINE_SEPARATORS[value];
}

function parseConcurrency(value: unknown): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`Invalid concurrency: ${String(value)}. Must be a non-negative integer`);
  }
  return parsed;
}

function readConfigFile(configPath: string): RawConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Configuration not readable: ${configPath} (${error instanceof Error ? error.message : String(error)})`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in configuration ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Configuration ${configPath} must contain a JSON object`);
  }

  const record: Record<string, unknown> = { ...parsed };
  return {
    baseDir: record.baseDir,
    lineSeparator: record.lineSeparator,
    concurrency: record.concurrency,
  };
}

/**
 * Load server configuration
 *
 * Resolution order for the configuration file: explicit `configPath`,
 * `SECTION_EDITOR_CONFIG` env var, then `./section-editor.json` when it
 * exists. Without a file, defaults apply. `SECTION_EDITOR_LINE_SEPARATOR`
 * and `SECTION_EDITOR_CONCURRENCY` override file values.
 *
 * @param configPath - Optional path to a JSON configuration file
 * @param env - Environment to read overrides from (default: process.env)
 * @returns Validated configuration
 * @throws {ConfigError} When the file is unreadable or a value is invalid
 *
 * @example
 * ```typescript
 * // section-editor.json: { "baseDir": "./generated", "lineSeparator": "lf", "concurrency": 4 }
 * const config = loadConfig();
 * // Returns: { baseDir: '/abs/generated', lineSeparator: '\n', concurrency: 4 }
 * ```
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const explicitPath = configPath ?? env.SECTION_EDITOR_CONFIG;
  const defaultPath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);

  let raw: RawConfig = {};
  let configDir = process.cwd();

  if (explicitPath) {
    const resolved = path.resolve(process.cwd(), explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Configuration not found: ${resolved}`);
    }
    raw = readConfigFile(resolved);
    configDir = path.dirname(resolved);
  } else if (fs.existsSync(defaultPath)) {
    raw = readConfigFile(defaultPath);
  }

  const baseDirValue = raw.baseDir ?? '.';
  if (typeof baseDirValue !== 'string') {
    throw new ConfigError(`Invalid baseDir: ${String(baseDirValue)}. Must be a string`);
  }

  const baseDir = path.resolve(configDir, baseDirValue);
  const lineSeparator = resolveLineSeparator(
    env.SECTION_EDITOR_LINE_SEPARATOR ?? raw.lineSeparator ?? 'os'
  );
  const concurrency = parseConcurrency(env.SECTION_EDITOR_CONCURRENCY ?? raw.concurrency ?? 0);

  return { baseDir, lineSeparator, concurrency };
}

/**
 * Validate that the configured base directory exists
 *
 * @throws {ConfigError} When baseDir is missing or not a directory
 */
export function validateConfiguration(config: ServerConfig): void {
  if (!fs.existsSync(config.baseDir) || !fs.statSync(config.baseDir).isDirectory()) {
    throw new ConfigError(`Base directory does not exist: ${config.baseDir}`);
  }
}

/**
 * Build the edit strategy matching the configured concurrency
 */
export function createStrategy(config: ServerConfig): EditStrategy {
  return config.concurrency > 0 ? concurrentStrategy(config.concurrency) : sequentialStrategy;
}
