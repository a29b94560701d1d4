/**
 * Linux distribution detection and build dependency installation.
 *
 * Only the Debian and Red Hat families are supported; both are recognised
 * from /etc/os-release.
 */

import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { runChecked, type CommandSpec, type ProcessRunner } from './process.js';

export type DistroFamily = 'debian' | 'redhat';

export const DISTRO_FAMILIES: readonly DistroFamily[] = ['debian', 'redhat'];

export const DEFAULT_OS_RELEASE_PATH = '/etc/os-release';

const FAMILY_IDS: Record<DistroFamily, readonly string[]> = {
  debian: ['debian', 'ubuntu'],
  redhat: ['rhel', 'fedora', 'centos'],
};

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEPENDENCIES_PATH = join(__dirname, '..', 'data', 'system-dependencies.json');

export class UnsupportedDistroError extends Error {
  /** ID_LIKE / ID value that was found, if any */
  public readonly found?: string;

  constructor(message: string, found?: string) {
    super(message);
    this.name = 'UnsupportedDistroError';
    this.found = found;
  }
}

/**
 * Parse os-release(5) content into a key/value map.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq <= 0) continue;

    const key = line.slice(0, eq);
    let value = line.slice(eq + 1);
    const quoted = /^(["'])(.*)\1$/.exec(value);
    if (quoted) {
      value = quoted[2] ?? '';
    }
    fields[key] = value;
  }

  return fields;
}

export function detectDistroFamily(osRelease: string): DistroFamily {
  const fields = parseOsRelease(osRelease);
  const like = fields['ID_LIKE'] || fields['ID'];

  if (!like) {
    throw new UnsupportedDistroError('os-release has neither ID_LIKE nor ID');
  }

  const ids = like.toLowerCase().split(/\s+/).filter(Boolean);
  for (const family of DISTRO_FAMILIES) {
    if (ids.some((id) => FAMILY_IDS[family].includes(id))) {
      return family;
    }
  }

  throw new UnsupportedDistroError(`Unsupported distro: ${like}`, like);
}

export async function readDistroFamily(path: string = DEFAULT_OS_RELEASE_PATH): Promise<DistroFamily> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new UnsupportedDistroError(
      `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return detectDistroFamily(content);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.length > 0 && value.every((item) => typeof item === 'string');
}

function toCommands(value: unknown, family: DistroFamily): CommandSpec[] {
  if (!Array.isArray(value)) {
    throw new Error(`No dependency commands for ${family} in ${DEPENDENCIES_PATH}`);
  }
  return value.map((entry: unknown) => {
    if (!isStringArray(entry)) {
      throw new Error(`Malformed dependency command for ${family} in ${DEPENDENCIES_PATH}`);
    }
    const [name, ...args] = entry;
    return { command: name ?? '', args };
  });
}

let cachedCommands: Record<DistroFamily, CommandSpec[]> | null = null;

/**
 * Package manager commands that install an interpreter's build dependencies.
 */
export function systemDependencyCommands(family: DistroFamily): CommandSpec[] {
  if (!cachedCommands) {
    const data: unknown = JSON.parse(readFileSync(DEPENDENCIES_PATH, 'utf-8'));
    if (typeof data !== 'object' || data === null) {
      throw new Error(`Malformed ${DEPENDENCIES_PATH}`);
    }
    const table = new Map<string, unknown>(Object.entries(data));
    cachedCommands = {
      debian: toCommands(table.get('debian'), 'debian'),
      redhat: toCommands(table.get('redhat'), 'redhat'),
    };
  }
  return cachedCommands[family].map((spec) => ({ command: spec.command, args: [...spec.args] }));
}

export function installSystemDependencies(
  family: DistroFamily,
  runner: ProcessRunner,
  onCommand?: (spec: CommandSpec) => void
): void {
  for (const spec of systemDependencyCommands(family)) {
    onCommand?.(spec);
    runChecked(runner, spec);
  }
}
