/**
 * Sequential build driver.
 *
 * Builds the newest release of each minor line in place, newest first. A
 * failing command only abandons the tag it belongs to; the checkout is put
 * back on the original ref whatever happens.
 */

import type { BuildConfig } from './config.js';
import { installSystemDependencies, readDistroFamily, type DistroFamily } from './distro.js';
import { GitRepository, type RecordedRef } from './git.js';
import {
  command,
  createProcessRunner,
  isCommandFailedError,
  runChecked,
  type CommandFailedError,
  type CommandSpec,
  type ProcessRunner,
} from './process.js';
import {
  parseVersionBound,
  selectLatestMinorVersions,
  type VersionBounds,
  type VersionTag,
} from './versions.js';

export type BuildStep = 'checkout' | 'configure' | 'clean' | 'build' | 'install';

export interface StepPlan {
  step: BuildStep;
  commands: CommandSpec[];
}

export interface InstalledOutcome {
  tag: string;
  version: string;
  status: 'installed';
}

export interface FailedOutcome {
  tag: string;
  version: string;
  status: 'failed';
  failedStep: BuildStep;
  error: CommandFailedError;
}

export type TagOutcome = InstalledOutcome | FailedOutcome;

export type RestoreStatus = 'restored' | 'failed' | 'skipped';

export interface BuildReport {
  initialRef: RecordedRef;
  selected: VersionTag[];
  outcomes: TagOutcome[];
  restore: RestoreStatus;
}

export type BuildProgressEvent =
  | { type: 'ref-recorded'; ref: RecordedRef }
  | { type: 'distro-detected'; family: DistroFamily }
  | { type: 'system-deps'; command: CommandSpec }
  | { type: 'pull'; enabled: boolean }
  | { type: 'selected'; tags: VersionTag[] }
  | { type: 'step-start'; tag: string; step: BuildStep; index: number; total: number }
  | { type: 'command'; command: CommandSpec }
  | { type: 'tag-installed'; outcome: InstalledOutcome }
  | { type: 'tag-failed'; outcome: FailedOutcome }
  | { type: 'restoring'; ref: RecordedRef }
  | { type: 'restore-failed'; ref: RecordedRef; error: unknown };

export type BuildProgressCallback = (event: BuildProgressEvent) => void;

export interface BuildOptions {
  /** Interpreter checkout, built in place */
  repoDir: string;
  config: BuildConfig;
  runner?: ProcessRunner;
  /** Select and report only; no command that changes anything is run */
  dryRun?: boolean;
  onProgress?: BuildProgressCallback;
  /** Override distro detection (defaults to reading config.osReleasePath) */
  detectDistro?: (osReleasePath: string) => Promise<DistroFamily>;
}

/**
 * Commands for each step of building one tag.
 */
export function buildSteps(tag: string, config: BuildConfig): StepPlan[] {
  return [
    {
      step: 'checkout',
      commands: [command('git', 'add', '-A'), command('git', 'reset', '--hard'), command('git', 'checkout', tag)],
    },
    { step: 'configure', commands: [command('./configure', ...config.configureFlags)] },
    { step: 'clean', commands: [command('make', 'clean')] },
    { step: 'build', commands: [command('make', ...config.makeFlags)] },
    { step: 'install', commands: [command('make', config.installTarget)] },
  ];
}

export function resolveBounds(config: BuildConfig): VersionBounds {
  return {
    minimum: config.minimumVersion ? parseVersionBound(config.minimumVersion, config.tagMarker) : undefined,
    maximum: config.maximumVersion ? parseVersionBound(config.maximumVersion, config.tagMarker) : undefined,
  };
}

/**
 * Build and install a single tag. Command failures are returned as a failed
 * outcome; anything else propagates.
 */
export function buildVersion(
  repoDir: string,
  target: VersionTag,
  config: BuildConfig,
  runner: ProcessRunner,
  progress: { index: number; total: number; onProgress?: BuildProgressCallback } = { index: 1, total: 1 }
): TagOutcome {
  const { onProgress } = progress;
  const version = target.version.version;

  for (const plan of buildSteps(target.tag, config)) {
    onProgress?.({ type: 'step-start', tag: target.tag, step: plan.step, index: progress.index, total: progress.total });
    try {
      for (const spec of plan.commands) {
        onProgress?.({ type: 'command', command: spec });
        runChecked(runner, spec, repoDir);
      }
    } catch (error) {
      if (!isCommandFailedError(error)) throw error;
      const outcome: FailedOutcome = { tag: target.tag, version, status: 'failed', failedStep: plan.step, error };
      onProgress?.({ type: 'tag-failed', outcome });
      return outcome;
    }
  }

  const outcome: InstalledOutcome = { tag: target.tag, version, status: 'installed' };
  onProgress?.({ type: 'tag-installed', outcome });
  return outcome;
}

/**
 * Build every selected minor line, newest first, then restore the checkout.
 *
 * Throws before touching the repository when the bounds are invalid or the
 * distro is unsupported. A failed `git pull` or dependency install is fatal
 * but the original ref is still restored.
 */
export async function buildAllMinorVersions(options: BuildOptions): Promise<BuildReport> {
  const { repoDir, config, onProgress } = options;
  const runner = options.runner ?? createProcessRunner();
  const dryRun = options.dryRun ?? false;
  const repo = new GitRepository(repoDir, runner);

  const bounds = resolveBounds(config);

  let family: DistroFamily | undefined;
  if (config.installSystemDependencies && !dryRun) {
    const detect = options.detectDistro ?? readDistroFamily;
    family = await detect(config.osReleasePath);
    onProgress?.({ type: 'distro-detected', family });
  }

  const initialRef = repo.currentRef();
  onProgress?.({ type: 'ref-recorded', ref: initialRef });

  const selectTags = (): VersionTag[] => {
    const tags = selectLatestMinorVersions(repo.listTags(), { bounds, marker: config.tagMarker });
    onProgress?.({ type: 'selected', tags });
    return tags;
  };

  if (dryRun) {
    return { initialRef, selected: selectTags(), outcomes: [], restore: 'skipped' };
  }

  let selected: VersionTag[] = [];
  const outcomes: TagOutcome[] = [];
  let restore: RestoreStatus = 'skipped';

  try {
    if (family) {
      installSystemDependencies(family, runner, (spec) => onProgress?.({ type: 'system-deps', command: spec }));
    }

    onProgress?.({ type: 'pull', enabled: config.pull });
    if (config.pull) {
      repo.pull();
    }

    selected = selectTags();
    selected.forEach((target, i) => {
      outcomes.push(buildVersion(repoDir, target, config, runner, { index: i + 1, total: selected.length, onProgress }));
    });
  } finally {
    onProgress?.({ type: 'restoring', ref: initialRef });
    try {
      repo.restore(initialRef);
      restore = 'restored';
    } catch (error) {
      restore = 'failed';
      onProgress?.({ type: 'restore-failed', ref: initialRef, error });
    }
  }

  return { initialRef, selected, outcomes, restore };
}
