/**
 * External command execution.
 *
 * Every command runs to completion before the next one starts. Output is
 * captured rather than streamed so a failure can be reported with it.
 */

import { spawnSync } from 'node:child_process';

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface CommandResult {
  /** Exit status, or null when the process could not be started or was killed */
  status: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

export interface ProcessRunner {
  run(spec: CommandSpec, options?: RunOptions): CommandResult;
}

/** make output for a full interpreter build runs to tens of megabytes */
const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;

export class CommandFailedError extends Error {
  public readonly spec: CommandSpec;
  public readonly status: number | null;
  public readonly signal: string | null;
  public readonly stdout: string;
  public readonly stderr: string;

  constructor(spec: CommandSpec, result: CommandResult) {
    const reason = result.signal
      ? `killed by ${result.signal}`
      : result.status === null
        ? 'could not be started'
        : `exited with status ${result.status}`;
    super(`Command "${formatCommand(spec)}" ${reason}`);

    this.name = 'CommandFailedError';
    this.spec = spec;
    this.status = result.status;
    this.signal = result.signal;
    this.stdout = result.stdout;
    this.stderr = result.stderr;
  }
}

export function isCommandFailedError(error: unknown): error is CommandFailedError {
  return error instanceof CommandFailedError;
}

export function command(name: string, ...args: string[]): CommandSpec {
  return { command: name, args };
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

export function createProcessRunner(): ProcessRunner {
  return {
    run(spec, options = {}) {
      const result = spawnSync(spec.command, spec.args, {
        cwd: options.cwd,
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'pipe'],
        maxBuffer: MAX_OUTPUT_BYTES,
      });

      if (result.error) {
        return {
          status: null,
          signal: result.signal,
          stdout: result.stdout ?? '',
          stderr: [result.stderr ?? '', result.error.message].filter(Boolean).join('\n'),
        };
      }

      return {
        status: result.status,
        signal: result.signal,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    },
  };
}

/**
 * Run a command and return its stdout, throwing CommandFailedError on any
 * non-zero exit.
 */
export function runChecked(runner: ProcessRunner, spec: CommandSpec, cwd?: string): string {
  const result = runner.run(spec, { cwd });
  if (result.status !== 0) {
    throw new CommandFailedError(spec, result);
  }
  return result.stdout;
}

/**
 * Last `lines` lines of captured output; 0 keeps everything.
 */
export function tailLines(output: string, lines: number): string {
  const trimmed = output.replace(/\s+$/, '');
  if (lines <= 0) return trimmed;
  const all = trimmed.split('\n');
  return all.length <= lines ? trimmed : all.slice(-lines).join('\n');
}
