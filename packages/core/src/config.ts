/**
 * Default configuration and config loading for minorbuild
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve, join } from 'path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_OS_RELEASE_PATH } from './distro.js';
import { DEFAULT_TAG_MARKER } from './versions.js';

export interface BuildConfig {
  /** Lowest version to build, inclusive */
  minimumVersion?: string;
  /** Highest version to build, inclusive */
  maximumVersion?: string;
  /** Character stripped from the front of tags before parsing */
  tagMarker: string;
  /** Run `git pull` before building */
  pull: boolean;
  /** Install build dependencies with apt/yum first */
  installSystemDependencies: boolean;
  configureFlags: string[];
  makeFlags: string[];
  /** make target used to install; altinstall leaves the unversioned binary alone */
  installTarget: string;
  osReleasePath: string;
  /** Lines of captured output shown for a failed command (0 = all) */
  outputTailLines: number;
}

export const DEFAULT_CONFIG: BuildConfig = {
  minimumVersion: '3.0.0',
  tagMarker: DEFAULT_TAG_MARKER,
  pull: false,
  installSystemDependencies: true,
  configureFlags: ['--enable-optimizations'],
  makeFlags: ['-j'],
  installTarget: 'altinstall',
  osReleasePath: DEFAULT_OS_RELEASE_PATH,
  outputTailLines: 40,
};

export const CONFIG_FILE_NAMES = [
  'minorbuild.config.yaml',
  'minorbuild.config.yml',
  'minorbuild.config.json',
  '.minorbuildrc',
  '.minorbuildrc.yaml',
  '.minorbuildrc.yml',
  '.minorbuildrc.json',
];

export class ConfigError extends Error {
  public readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
    this.path = path;
  }
}

type StringKey = 'minimumVersion' | 'maximumVersion' | 'tagMarker' | 'installTarget' | 'osReleasePath';
type BooleanKey = 'pull' | 'installSystemDependencies';
type ListKey = 'configureFlags' | 'makeFlags';

const STRING_KEYS: readonly StringKey[] = [
  'minimumVersion',
  'maximumVersion',
  'tagMarker',
  'installTarget',
  'osReleasePath',
];
const BOOLEAN_KEYS: readonly BooleanKey[] = ['pull', 'installSystemDependencies'];
const LIST_KEYS: readonly ListKey[] = ['configureFlags', 'makeFlags'];
const KNOWN_KEYS = new Set<string>([...STRING_KEYS, ...BOOLEAN_KEYS, ...LIST_KEYS, 'outputTailLines']);

function toFlagList(value: unknown, key: string, path?: string): string[] {
  // A single string is split the way a shell would split unquoted flags
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(Boolean);
  }
  if (Array.isArray(value) && value.every((item) => typeof item === 'string' || typeof item === 'number')) {
    return value.map((item) => String(item));
  }
  throw new ConfigError(`'${key}' must be a string or a list of strings`, path);
}

/**
 * Validate parsed config content. Unknown keys are rejected so typos surface.
 */
export function validateConfig(raw: unknown, path?: string): Partial<BuildConfig> {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError('config must be a mapping', path);
  }

  const entries = new Map<string, unknown>(Object.entries(raw));
  const config: Partial<BuildConfig> = {};

  for (const key of entries.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`unknown key '${key}'`, path);
    }
  }

  for (const key of STRING_KEYS) {
    const value = entries.get(key);
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ConfigError(`'${key}' must be a string`, path);
    }
    config[key] = String(value);
  }

  for (const key of BOOLEAN_KEYS) {
    const value = entries.get(key);
    if (value === undefined || value === null) continue;
    if (typeof value !== 'boolean') {
      throw new ConfigError(`'${key}' must be true or false`, path);
    }
    config[key] = value;
  }

  for (const key of LIST_KEYS) {
    const value = entries.get(key);
    if (value === undefined || value === null) continue;
    config[key] = toFlagList(value, key, path);
  }

  const tail = entries.get('outputTailLines');
  if (tail !== undefined && tail !== null) {
    if (typeof tail !== 'number' || !Number.isInteger(tail) || tail < 0) {
      throw new ConfigError(`'outputTailLines' must be a non-negative integer`, path);
    }
    config.outputTailLines = tail;
  }

  return config;
}

export function mergeConfig(base: BuildConfig, override: Partial<BuildConfig>): BuildConfig {
  return {
    ...base,
    ...override,
    // Lists replace rather than append
    configureFlags: override.configureFlags ?? base.configureFlags,
    makeFlags: override.makeFlags ?? base.makeFlags,
  };
}

async function readConfigFile(configPath: string): Promise<Partial<BuildConfig>> {
  const content = await readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), configPath);
  }
  return validateConfig(parsed, configPath);
}

/**
 * Locate a config file, first in each search directory in order.
 */
export function findConfigFile(searchDirs: string[]): string | null {
  for (const dir of searchDirs) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(dir, fileName);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
  }
  return null;
}

/**
 * Load config from an explicit path, or search the given directories.
 * Falls back to DEFAULT_CONFIG when nothing is found.
 */
export async function loadConfig(options: { configPath?: string; searchDirs?: string[] } = {}): Promise<BuildConfig> {
  if (options.configPath) {
    const configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError('config file not found', configPath);
    }
    return mergeConfig(DEFAULT_CONFIG, await readConfigFile(configPath));
  }

  const found = findConfigFile(options.searchDirs ?? [process.cwd()]);
  if (found) {
    return mergeConfig(DEFAULT_CONFIG, await readConfigFile(found));
  }

  return DEFAULT_CONFIG;
}

export function resolveTargetPath(input?: string): string {
  if (!input) {
    return process.cwd();
  }
  return resolve(input);
}
