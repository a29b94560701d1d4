/**
 * Deterministic Error Codes for the minorbuild CLI
 *
 * Format: MB_<CATEGORY>_<NUMBER>
 *
 * Categories:
 * - CONFIG: Configuration errors
 * - CLI: Command line argument errors
 * - BUILD: Build toolchain errors
 * - GIT: Repository errors
 * - SYSTEM: Host / package manager errors
 */

import {
  ConfigError,
  InvalidVersionError,
  UnsupportedDistroError,
  formatCommand,
  isCommandFailedError,
} from '@minorbuild/core';

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_NOT_FOUND: 'MB_CONFIG_001',
  CONFIG_INVALID: 'MB_CONFIG_002',

  // CLI errors (100-199)
  CLI_INVALID_ARGUMENT: 'MB_CLI_101',
  CLI_MISSING_ARGUMENT: 'MB_CLI_102',

  // BUILD errors (200-299)
  BUILD_COMMAND_FAILED: 'MB_BUILD_201',
  BUILD_VERSIONS_FAILED: 'MB_BUILD_202',

  // GIT errors (300-399)
  GIT_NOT_A_REPOSITORY: 'MB_GIT_301',
  GIT_COMMAND_FAILED: 'MB_GIT_302',
  GIT_PULL_FAILED: 'MB_GIT_303',
  GIT_RESTORE_FAILED: 'MB_GIT_304',

  // SYSTEM errors (400-499)
  SYSTEM_UNSUPPORTED_DISTRO: 'MB_SYSTEM_401',
  SYSTEM_DEPENDENCY_INSTALL_FAILED: 'MB_SYSTEM_402',

  UNEXPECTED: 'MB_INTERNAL_901',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * User-friendly error messages for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_NOT_FOUND]: 'Configuration file not found',
  [ErrorCodes.CONFIG_INVALID]: 'Configuration file is invalid',

  [ErrorCodes.CLI_INVALID_ARGUMENT]: 'Invalid argument provided',
  [ErrorCodes.CLI_MISSING_ARGUMENT]: 'Required argument missing',

  [ErrorCodes.BUILD_COMMAND_FAILED]: 'Build command failed',
  [ErrorCodes.BUILD_VERSIONS_FAILED]: 'One or more versions failed to build',

  [ErrorCodes.GIT_NOT_A_REPOSITORY]: 'Not a git repository',
  [ErrorCodes.GIT_COMMAND_FAILED]: 'git command failed',
  [ErrorCodes.GIT_PULL_FAILED]: 'git pull failed',
  [ErrorCodes.GIT_RESTORE_FAILED]: 'Could not restore the original checkout',

  [ErrorCodes.SYSTEM_UNSUPPORTED_DISTRO]: 'Unsupported Linux distribution',
  [ErrorCodes.SYSTEM_DEPENDENCY_INSTALL_FAILED]: 'Installing build dependencies failed',

  [ErrorCodes.UNEXPECTED]: 'Unexpected error',
};

/**
 * Remediation guidance for each error code
 */
export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_NOT_FOUND]: `
The file passed to --config does not exist.

Without --config, minorbuild looks for minorbuild.config.yaml (or .minorbuildrc)
in the repository directory, then in the current directory.
`.trim(),

  [ErrorCodes.CONFIG_INVALID]: `
Check your minorbuild.config.yaml. Known keys:

  minimumVersion, maximumVersion, tagMarker, pull,
  installSystemDependencies, configureFlags, makeFlags,
  installTarget, osReleasePath, outputTailLines
`.trim(),

  [ErrorCodes.CLI_INVALID_ARGUMENT]: `
Version bounds must be full versions, with or without the tag marker:

  minorbuild install -d ./cpython --min 3.8.0 --max v3.12.0
`.trim(),

  [ErrorCodes.CLI_MISSING_ARGUMENT]: `
A required argument is missing.

Check the command syntax:
  minorbuild --help
  minorbuild <command> --help
`.trim(),

  [ErrorCodes.BUILD_COMMAND_FAILED]: `
A configure/make step failed. Re-run with --verbose to see every command,
and check that the build dependencies are installed.
`.trim(),

  [ErrorCodes.BUILD_VERSIONS_FAILED]: `
Some versions did not install. The summary above lists the failing step
for each; the captured output of the failing command is printed with it.

Drop --strict to exit successfully when at least the run itself completed.
`.trim(),

  [ErrorCodes.GIT_NOT_A_REPOSITORY]: `
--repo-dir must point at a git checkout of the interpreter sources:

  git clone https://github.com/python/cpython.git
  minorbuild install -d ./cpython
`.trim(),

  [ErrorCodes.GIT_COMMAND_FAILED]: `
Check that git is installed and that the repository is not locked
by another process (look for .git/index.lock).
`.trim(),

  [ErrorCodes.GIT_PULL_FAILED]: `
git pull did not succeed. Check network access and that the current
branch tracks a remote, or run without --pull.
`.trim(),

  [ErrorCodes.GIT_RESTORE_FAILED]: `
The repository was left on a release tag. Check it out manually:

  git -C <repo-dir> checkout <ref shown above>
`.trim(),

  [ErrorCodes.SYSTEM_UNSUPPORTED_DISTRO]: `
Build dependencies can only be installed on Debian- or Red Hat-family
systems. Install them yourself and run with --no-system-deps.
`.trim(),

  [ErrorCodes.SYSTEM_DEPENDENCY_INSTALL_FAILED]: `
The package manager needs root privileges. Run minorbuild as root, or
install the dependencies yourself and pass --no-system-deps.
`.trim(),

  [ErrorCodes.UNEXPECTED]: `
Re-run with --verbose and report the output.
`.trim(),
};

/**
 * Structured CLI Error with deterministic error code
 */
export class CLIError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: { details?: unknown; cause?: Error }) {
    const baseMessage = message ?? ErrorMessages[code];
    super(baseMessage, { cause: options?.cause });

    this.name = 'CLIError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    Error.captureStackTrace?.(this, CLIError);
  }

  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
      if (this.cause.stack) {
        parts.push(`\n${this.cause.stack}`);
      }
    }

    return parts.join('');
  }

  toUserStringWithRemediation(verbose = false): string {
    const parts: string[] = [this.toUserString(verbose)];
    const remediation = this.getRemediation();

    if (remediation) {
      parts.push('\n\nHow to fix:\n');
      const indented = remediation
        .split('\n')
        .map((line) => `  ${line}`)
        .join('\n');
      parts.push(indented);
    }

    return parts.join('');
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Wrap an unknown error in a CLIError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CLIError(code, message, { cause });
}

const PACKAGE_MANAGERS = new Set(['apt', 'apt-get', 'yum', 'yum-builddep', 'dnf']);

/**
 * Map errors raised by @minorbuild/core onto CLI error codes.
 */
export function toCLIError(error: unknown): CLIError {
  if (isCLIError(error)) return error;

  if (error instanceof InvalidVersionError) {
    return new CLIError(ErrorCodes.CLI_INVALID_ARGUMENT, error.message, { cause: error });
  }
  if (error instanceof ConfigError) {
    return new CLIError(ErrorCodes.CONFIG_INVALID, error.message, { cause: error });
  }
  if (error instanceof UnsupportedDistroError) {
    return new CLIError(ErrorCodes.SYSTEM_UNSUPPORTED_DISTRO, error.message, {
      cause: error,
      details: error.found ? { found: error.found } : undefined,
    });
  }
  if (isCommandFailedError(error)) {
    const details = { command: formatCommand(error.spec), status: error.status };
    const { command, args } = error.spec;
    if (PACKAGE_MANAGERS.has(command)) {
      return new CLIError(ErrorCodes.SYSTEM_DEPENDENCY_INSTALL_FAILED, error.message, { cause: error, details });
    }
    if (command === 'git') {
      const code = args[0] === 'pull' ? ErrorCodes.GIT_PULL_FAILED : ErrorCodes.GIT_COMMAND_FAILED;
      return new CLIError(code, error.message, { cause: error, details });
    }
    return new CLIError(ErrorCodes.BUILD_COMMAND_FAILED, error.message, { cause: error, details });
  }

  return wrapError(error, ErrorCodes.UNEXPECTED);
}
