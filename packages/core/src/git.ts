/**
 * Git operations on the interpreter checkout being built in place.
 */

import { command, runChecked, type ProcessRunner } from './process.js';

export interface RecordedRef {
  /** Commit HEAD pointed at when recorded */
  sha: string;
  /** Branch name when HEAD was attached, null when detached */
  branch: string | null;
}

export function describeRef(ref: RecordedRef): string {
  return ref.branch ? `${ref.branch} (${ref.sha})` : ref.sha;
}

export class GitRepository {
  public readonly dir: string;
  private readonly runner: ProcessRunner;

  constructor(dir: string, runner: ProcessRunner) {
    this.dir = dir;
    this.runner = runner;
  }

  private git(...args: string[]): string {
    return runChecked(this.runner, command('git', ...args), this.dir);
  }

  isRepository(): boolean {
    const result = this.runner.run(command('git', 'rev-parse', '--is-inside-work-tree'), { cwd: this.dir });
    return result.status === 0 && result.stdout.trim() === 'true';
  }

  listTags(): string[] {
    return this.git('tag').split(/\s+/).filter(Boolean);
  }

  currentRef(): RecordedRef {
    const sha = this.git('rev-parse', 'HEAD').trim();
    // symbolic-ref exits 1 on a detached HEAD
    const symbolic = this.runner.run(command('git', 'symbolic-ref', '--short', '-q', 'HEAD'), {
      cwd: this.dir,
    });
    const branch = symbolic.status === 0 ? symbolic.stdout.trim() || null : null;
    return { sha, branch };
  }

  pull(): void {
    this.git('pull');
  }

  checkout(ref: string): void {
    this.git('checkout', ref);
  }

  restore(ref: RecordedRef): void {
    this.checkout(ref.branch ?? ref.sha);
  }
}
