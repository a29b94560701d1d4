/**
 * Release tag parsing and minor-line selection.
 *
 * A tag such as `v3.11.4` belongs to the minor line `3.11`. Selection keeps the
 * newest tag of each line that falls inside the requested bounds.
 */

import semver from 'semver';
import type { SemVer } from 'semver';

export interface VersionTag {
  /** Tag label exactly as git reports it */
  tag: string;
  version: SemVer;
}

export interface VersionBounds {
  /** Inclusive lower bound */
  minimum?: SemVer;
  /** Inclusive upper bound */
  maximum?: SemVer;
}

export interface SelectOptions {
  bounds?: VersionBounds;
  /** Leading character stripped before parsing (default: 'v') */
  marker?: string;
}

export const DEFAULT_TAG_MARKER = 'v';

export class InvalidVersionError extends Error {
  public readonly input: string;

  constructor(input: string) {
    super(`Not a valid semantic version: "${input}"`);
    this.name = 'InvalidVersionError';
    this.input = input;
  }
}

function parseStrict(input: string, marker: string): SemVer | null {
  const body = marker && input.startsWith(marker) ? input.slice(marker.length) : input;
  // semver itself tolerates a leading "v" or "="; only a digit may start the body here
  if (!/^\d/.test(body)) return null;
  return semver.parse(body);
}

/**
 * Parse a raw tag. Returns null for anything that is not a full
 * `major.minor.patch` version once the marker is removed.
 */
export function parseVersionTag(tag: string, marker: string = DEFAULT_TAG_MARKER): VersionTag | null {
  const version = parseStrict(tag, marker);
  return version ? { tag, version } : null;
}

/**
 * Parse a user-supplied bound (CLI flag or config value).
 */
export function parseVersionBound(input: string, marker: string = DEFAULT_TAG_MARKER): SemVer {
  const version = parseStrict(input.trim(), marker);
  if (!version) {
    throw new InvalidVersionError(input);
  }
  return version;
}

export function isWithinBounds(version: SemVer, bounds: VersionBounds = {}): boolean {
  if (bounds.minimum && semver.lt(version, bounds.minimum)) return false;
  if (bounds.maximum && semver.gt(version, bounds.maximum)) return false;
  return true;
}

export function minorLineOf(version: SemVer): string {
  return `${version.major}.${version.minor}`;
}

/**
 * Group tags by minor line, keeping lines in first-seen order.
 */
export function groupByMinorLine(tags: VersionTag[]): Map<string, VersionTag[]> {
  const groups = new Map<string, VersionTag[]>();
  for (const entry of tags) {
    const key = minorLineOf(entry.version);
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }
  return groups;
}

function latestOf(group: VersionTag[]): VersionTag | undefined {
  let latest: VersionTag | undefined;
  for (const entry of group) {
    if (!latest || semver.gt(entry.version, latest.version)) {
      latest = entry;
    }
  }
  return latest;
}

/**
 * Pick the newest tag of every minor line within bounds, newest line first.
 *
 * Unparseable tags are dropped silently. Bounds are applied before grouping,
 * so a maximum of 3.8.5 selects 3.8.5 even when 3.8.10 exists.
 */
export function selectLatestMinorVersions(tags: string[], options: SelectOptions = {}): VersionTag[] {
  const marker = options.marker ?? DEFAULT_TAG_MARKER;

  const parsed: VersionTag[] = [];
  for (const tag of tags) {
    const entry = parseVersionTag(tag, marker);
    if (entry && isWithinBounds(entry.version, options.bounds)) {
      parsed.push(entry);
    }
  }

  const selected: VersionTag[] = [];
  for (const group of groupByMinorLine(parsed).values()) {
    const latest = latestOf(group);
    if (latest) selected.push(latest);
  }

  return selected.sort((a, b) => semver.rcompare(a.version, b.version));
}
