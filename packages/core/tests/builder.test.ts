/**
 * Tests for the sequential build driver
 */

import { describe, it, expect } from 'vitest';
import {
  buildAllMinorVersions,
  buildSteps,
  buildVersion,
  type BuildProgressEvent,
} from '../src/builder.js';
import { DEFAULT_CONFIG, type BuildConfig } from '../src/config.js';
import { UnsupportedDistroError } from '../src/distro.js';
import { CommandFailedError } from '../src/process.js';
import { InvalidVersionError, parseVersionTag } from '../src/versions.js';
import { createRepoRunner, failure, type FakeRunner } from './helpers/fake-runner.js';

const REPO = '/srv/cpython';

const TAGS = ['v2.7.18', 'v3.8.9', 'v3.8.10', 'v3.9.1', 'v3.10.0rc1', 'v3.10.2', 'legacy'];

const config: BuildConfig = { ...DEFAULT_CONFIG, installSystemDependencies: false };

function tagCommands(tag: string): string[] {
  return [
    'git add -A',
    'git reset --hard',
    `git checkout ${tag}`,
    './configure --enable-optimizations',
    'make clean',
    'make -j',
    'make altinstall',
  ];
}

/** Fail `line` only while `tag` is checked out */
function failWhileOn(runner: FakeRunner, tag: string, line: string): FakeRunner {
  let current = '';
  return runner.handle((candidate) => {
    if (candidate.startsWith('git checkout ')) {
      current = candidate.slice('git checkout '.length);
      return undefined;
    }
    return candidate === line && current === tag ? failure(2, `error while running ${line}`) : undefined;
  });
}

describe('buildSteps', () => {
  it('uses the configured flags and install target', () => {
    const steps = buildSteps('v3.11.0', {
      ...config,
      configureFlags: ['--prefix=/opt/py', '--with-lto'],
      makeFlags: ['-j8'],
      installTarget: 'install',
    });

    expect(steps.map((s) => s.step)).toEqual(['checkout', 'configure', 'clean', 'build', 'install']);
    expect(steps[1]?.commands).toEqual([{ command: './configure', args: ['--prefix=/opt/py', '--with-lto'] }]);
    expect(steps[3]?.commands).toEqual([{ command: 'make', args: ['-j8'] }]);
    expect(steps[4]?.commands).toEqual([{ command: 'make', args: ['install'] }]);
  });
});

describe('buildVersion', () => {
  it('stops at the first failing step', () => {
    const runner = createRepoRunner([]).on('./configure --enable-optimizations', failure(1, 'no compiler'));
    const target = parseVersionTag('v3.9.1');
    if (!target) throw new Error('fixture tag did not parse');

    const outcome = buildVersion(REPO, target, config, runner);

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.failedStep).toBe('configure');
      expect(outcome.error.stderr).toBe('no compiler');
      expect(outcome.error.status).toBe(1);
    }
    expect(runner.lines).toEqual(tagCommands('v3.9.1').slice(0, 4));
    expect(runner.calls.every((call) => call.cwd === REPO)).toBe(true);
  });
});

describe('buildAllMinorVersions', () => {
  it('builds the newest release of each minor line, newest first, then restores the branch', async () => {
    const runner = createRepoRunner(TAGS);

    const report = await buildAllMinorVersions({ repoDir: REPO, config, runner });

    expect(report.selected.map((s) => s.tag)).toEqual(['v3.10.2', 'v3.9.1', 'v3.8.10']);
    expect(report.outcomes.map((o) => [o.tag, o.status])).toEqual([
      ['v3.10.2', 'installed'],
      ['v3.9.1', 'installed'],
      ['v3.8.10', 'installed'],
    ]);
    expect(report.initialRef).toEqual({ sha: '0123abcd', branch: 'main' });
    expect(report.restore).toBe('restored');
    expect(runner.lines).toEqual([
      'git rev-parse HEAD',
      'git symbolic-ref --short -q HEAD',
      'git tag',
      ...tagCommands('v3.10.2'),
      ...tagCommands('v3.9.1'),
      ...tagCommands('v3.8.10'),
      'git checkout main',
    ]);
  });

  it('isolates a failing version and continues with the next', async () => {
    const runner = failWhileOn(createRepoRunner(TAGS), 'v3.9.1', 'make -j');

    const report = await buildAllMinorVersions({ repoDir: REPO, config, runner });

    expect(report.outcomes.map((o) => [o.tag, o.status])).toEqual([
      ['v3.10.2', 'installed'],
      ['v3.9.1', 'failed'],
      ['v3.8.10', 'installed'],
    ]);
    const failed = report.outcomes[1];
    expect(failed?.status === 'failed' ? failed.failedStep : undefined).toBe('build');
    expect(runner.lines.filter((line) => line === 'make altinstall')).toHaveLength(2);
    expect(runner.lines.at(-1)).toBe('git checkout main');
  });

  it('restores the original ref when every version fails', async () => {
    const runner = createRepoRunner(TAGS).on('make clean', failure(2));

    const report = await buildAllMinorVersions({ repoDir: REPO, config, runner });

    expect(report.outcomes.every((o) => o.status === 'failed')).toBe(true);
    expect(report.restore).toBe('restored');
    expect(runner.lines.at(-1)).toBe('git checkout main');
  });

  it('restores a detached HEAD by commit', async () => {
    const runner = createRepoRunner(['v3.11.0'], { branch: null, sha: 'feedface' });

    const report = await buildAllMinorVersions({ repoDir: REPO, config, runner });

    expect(report.initialRef).toEqual({ sha: 'feedface', branch: null });
    expect(runner.lines.at(-1)).toBe('git checkout feedface');
  });

  it('records the ref before pulling and lists tags after', async () => {
    const runner = createRepoRunner(['v3.11.0']);

    await buildAllMinorVersions({ repoDir: REPO, config: { ...config, pull: true }, runner });

    expect(runner.lines.slice(0, 4)).toEqual([
      'git rev-parse HEAD',
      'git symbolic-ref --short -q HEAD',
      'git pull',
      'git tag',
    ]);
  });

  it('treats a failed pull as fatal but still restores', async () => {
    const runner = createRepoRunner(TAGS).on('git pull', failure(1, 'could not resolve host'));

    await expect(
      buildAllMinorVersions({ repoDir: REPO, config: { ...config, pull: true }, runner })
    ).rejects.toBeInstanceOf(CommandFailedError);

    expect(runner.lines).not.toContain('git tag');
    expect(runner.lines.at(-1)).toBe('git checkout main');
  });

  it('treats a failed dependency install as fatal but still restores', async () => {
    const runner = createRepoRunner(TAGS).on('apt update', failure(100, 'could not get lock'));

    await expect(
      buildAllMinorVersions({
        repoDir: REPO,
        config: { ...config, installSystemDependencies: true },
        runner,
        detectDistro: async () => 'debian',
      })
    ).rejects.toBeInstanceOf(CommandFailedError);

    expect(runner.lines).toEqual([
      'git rev-parse HEAD',
      'git symbolic-ref --short -q HEAD',
      'apt update',
      'git checkout main',
    ]);
  });

  it('treats unreadable tags as fatal but still restores', async () => {
    const runner = createRepoRunner(TAGS).on('git tag', failure(128, 'fatal: not a git repository'));

    await expect(buildAllMinorVersions({ repoDir: REPO, config, runner })).rejects.toBeInstanceOf(
      CommandFailedError
    );

    expect(runner.lines).toEqual([
      'git rev-parse HEAD',
      'git symbolic-ref --short -q HEAD',
      'git tag',
      'git checkout main',
    ]);
  });

  it('installs system dependencies for the detected distro before building', async () => {
    const runner = createRepoRunner(['v3.11.0']);
    const events: BuildProgressEvent[] = [];

    await buildAllMinorVersions({
      repoDir: REPO,
      config: { ...config, installSystemDependencies: true },
      runner,
      detectDistro: async () => 'redhat',
      onProgress: (event) => events.push(event),
    });

    expect(runner.lines.slice(0, 5)).toEqual([
      'git rev-parse HEAD',
      'git symbolic-ref --short -q HEAD',
      'yum install -y yum-utils',
      'yum-builddep -y python3',
      'git tag',
    ]);
    expect(events[0]).toEqual({ type: 'distro-detected', family: 'redhat' });
  });

  it('fails on an unsupported distro before running anything', async () => {
    const runner = createRepoRunner(TAGS);

    await expect(
      buildAllMinorVersions({
        repoDir: REPO,
        config: { ...config, installSystemDependencies: true },
        runner,
        detectDistro: async () => {
          throw new UnsupportedDistroError('Unsupported distro: arch', 'arch');
        },
      })
    ).rejects.toThrow('Unsupported distro: arch');

    expect(runner.calls).toEqual([]);
  });

  it('rejects an invalid bound before running anything', async () => {
    const runner = createRepoRunner(TAGS);

    await expect(
      buildAllMinorVersions({ repoDir: REPO, config: { ...config, maximumVersion: '3.10' }, runner })
    ).rejects.toBeInstanceOf(InvalidVersionError);

    expect(runner.calls).toEqual([]);
  });

  it('applies the configured bounds', async () => {
    const runner = createRepoRunner(TAGS);

    const report = await buildAllMinorVersions({
      repoDir: REPO,
      config: { ...config, minimumVersion: '3.9.0', maximumVersion: '3.9.99' },
      runner,
    });

    expect(report.selected.map((s) => s.tag)).toEqual(['v3.9.1']);
  });

  it('only reads the repository on a dry run', async () => {
    const runner = createRepoRunner(TAGS);

    const report = await buildAllMinorVersions({
      repoDir: REPO,
      config: { ...config, pull: true, installSystemDependencies: true },
      runner,
      dryRun: true,
      detectDistro: async () => {
        throw new Error('distro detection should not run on a dry run');
      },
    });

    expect(runner.lines).toEqual(['git rev-parse HEAD', 'git symbolic-ref --short -q HEAD', 'git tag']);
    expect(report.selected.map((s) => s.tag)).toEqual(['v3.10.2', 'v3.9.1', 'v3.8.10']);
    expect(report.outcomes).toEqual([]);
    expect(report.restore).toBe('skipped');
  });

  it('reports a failed restore instead of throwing', async () => {
    const runner = createRepoRunner(['v3.11.0']).on('git checkout main', failure(1, 'local changes'));
    const events: BuildProgressEvent[] = [];

    const report = await buildAllMinorVersions({
      repoDir: REPO,
      config,
      runner,
      onProgress: (event) => events.push(event),
    });

    expect(report.restore).toBe('failed');
    expect(report.outcomes.map((o) => o.status)).toEqual(['installed']);
    expect(events.at(-1)?.type).toBe('restore-failed');
  });

  it('propagates unexpected errors after restoring', async () => {
    const runner = createRepoRunner(['v3.11.0']).handle((line) => {
      if (line === 'make clean') throw new Error('runner crashed');
      return undefined;
    });

    await expect(buildAllMinorVersions({ repoDir: REPO, config, runner })).rejects.toThrow('runner crashed');

    expect(runner.lines.at(-1)).toBe('git checkout main');
  });

  it('emits progress events in order', async () => {
    const runner = failWhileOn(createRepoRunner(['v3.9.1', 'v3.10.2']), 'v3.9.1', 'make altinstall');
    const events: BuildProgressEvent[] = [];

    await buildAllMinorVersions({ repoDir: REPO, config, runner, onProgress: (event) => events.push(event) });

    const summary = events
      .filter((event) => event.type !== 'command')
      .map((event) => {
        switch (event.type) {
          case 'step-start':
            return `${event.index}/${event.total} ${event.step} ${event.tag}`;
          case 'tag-installed':
          case 'tag-failed':
            return `${event.type} ${event.outcome.tag}`;
          default:
            return event.type;
        }
      });

    expect(summary).toEqual([
      'ref-recorded',
      'pull',
      'selected',
      '1/2 checkout v3.10.2',
      '1/2 configure v3.10.2',
      '1/2 clean v3.10.2',
      '1/2 build v3.10.2',
      '1/2 install v3.10.2',
      'tag-installed v3.10.2',
      '2/2 checkout v3.9.1',
      '2/2 configure v3.9.1',
      '2/2 clean v3.9.1',
      '2/2 build v3.9.1',
      '2/2 install v3.9.1',
      'tag-failed v3.9.1',
      'restoring',
    ]);
  });
});
