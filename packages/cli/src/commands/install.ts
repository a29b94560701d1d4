/**
 * Install command - build and install the latest release of every minor line
 */

import {
  DEFAULT_CONFIG,
  GitRepository,
  buildAllMinorVersions,
  createProcessRunner,
  describeRef,
  type BuildOptions,
  type BuildReport,
  type ProcessRunner,
} from '@minorbuild/core';
import { CLIError, ErrorCodes } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { resolveRunContext, type InstallOptions, type RunContext } from '../lib/options.js';
import { createProgressLogger, printSummary, reportFatal } from '../lib/report.js';

export interface InstallDependencies {
  runner?: ProcessRunner;
  detectDistro?: BuildOptions['detectDistro'];
  /** Already-resolved repository and config; resolved from `options` when absent */
  context?: RunContext;
}

/**
 * Run the build and return its report. Throws CLIError (or a core error) on
 * anything fatal, including failed versions when `strict` is set.
 */
export async function runInstall(options: InstallOptions, deps: InstallDependencies = {}): Promise<BuildReport> {
  const { repoDir, config } = deps.context ?? (await resolveRunContext(options));
  const runner = deps.runner ?? createProcessRunner();

  if (!new GitRepository(repoDir, runner).isRepository()) {
    throw new CLIError(ErrorCodes.GIT_NOT_A_REPOSITORY, `Not a git repository: ${repoDir}`);
  }

  logger.debug('Effective configuration', { repoDir, ...config });

  const report = await buildAllMinorVersions({
    repoDir,
    config,
    runner,
    dryRun: options.dryRun,
    detectDistro: deps.detectDistro,
    onProgress: createProgressLogger(config.outputTailLines),
  });

  printSummary(report);

  if (report.restore === 'failed') {
    throw new CLIError(
      ErrorCodes.GIT_RESTORE_FAILED,
      `Could not restore the checkout to ${describeRef(report.initialRef)}`
    );
  }

  const failed = report.outcomes.filter((o) => o.status === 'failed');
  if (options.strict && failed.length > 0) {
    throw new CLIError(
      ErrorCodes.BUILD_VERSIONS_FAILED,
      `${failed.length} of ${report.outcomes.length} versions failed to build`,
      { details: { failed: failed.map((o) => o.tag) } }
    );
  }

  return report;
}

export async function installCommand(options: InstallOptions): Promise<void> {
  let outputTailLines = DEFAULT_CONFIG.outputTailLines;
  try {
    const context = await resolveRunContext(options);
    outputTailLines = context.config.outputTailLines;
    await runInstall(options, { context });
  } catch (error) {
    reportFatal(error, outputTailLines);
    process.exit(1);
  }
}
