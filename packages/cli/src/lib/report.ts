/**
 * Terminal reporting for build progress, summaries and fatal errors.
 */

import pc from 'picocolors';
import {
  DEFAULT_CONFIG,
  describeRef,
  formatCommand,
  isCommandFailedError,
  tailLines,
  type BuildProgressCallback,
  type BuildReport,
  type BuildStep,
} from '@minorbuild/core';
import { toCLIError, type CLIError } from './errors.js';
import { logger } from './logger.js';

const STEP_VERBS: Record<BuildStep, string> = {
  checkout: 'Getting',
  configure: 'Configuring',
  clean: 'Cleaning',
  build: 'Making',
  install: 'Installing',
};

export function createProgressLogger(outputTailLines: number): BuildProgressCallback {
  let announcedDependencies = false;

  return (event) => {
    switch (event.type) {
      case 'ref-recorded':
        logger.stage(`Initial ref: ${describeRef(event.ref)}`);
        break;
      case 'distro-detected':
        logger.debug(`Detected ${event.family} family distribution`);
        break;
      case 'system-deps':
        if (!announcedDependencies) {
          logger.stage('Installing system dependencies');
          announcedDependencies = true;
        }
        logger.debug(`$ ${formatCommand(event.command)}`);
        break;
      case 'pull':
        logger.stage(event.enabled ? 'Pulling' : 'Skipping pulling');
        break;
      case 'selected':
        if (event.tags.length === 0) {
          logger.warn('No release tags matched the version bounds');
        } else {
          logger.info(`Selected ${event.tags.length} version(s): ${event.tags.map((t) => t.tag).join(', ')}`);
        }
        break;
      case 'step-start':
        if (event.step === 'checkout') {
          logger.step(event.index, event.total, `${STEP_VERBS[event.step]} ${event.tag}`);
        } else {
          logger.stage(`${STEP_VERBS[event.step]} ${event.tag}`);
        }
        break;
      case 'command':
        logger.debug(`$ ${formatCommand(event.command)}`);
        break;
      case 'tag-installed':
        logger.success(`Installed ${event.outcome.tag}`);
        break;
      case 'tag-failed': {
        const { outcome } = event;
        logger.fail(`${outcome.tag}: ${outcome.failedStep} failed. ${outcome.error.message}`);
        logger.output('stdout', tailLines(outcome.error.stdout, outputTailLines));
        logger.output('stderr', tailLines(outcome.error.stderr, outputTailLines));
        break;
      }
      case 'restoring':
        logger.stage(`Restoring head to ${describeRef(event.ref)}`);
        break;
      case 'restore-failed':
        logger.error(
          `Could not restore ${describeRef(event.ref)}: ${event.error instanceof Error ? event.error.message : String(event.error)}`
        );
        break;
    }
  };
}

export function printSummary(report: BuildReport): void {
  const installed = report.outcomes.filter((o) => o.status === 'installed');
  const failed = report.outcomes.filter((o) => o.status === 'failed');

  if (logger.isJson) {
    logger.info('Build summary', {
      installed: installed.map((o) => o.tag),
      failed: failed.map((o) => ({ tag: o.tag, step: o.failedStep, status: o.error.status })),
      restore: report.restore,
    });
    return;
  }

  if (report.outcomes.length === 0) return;

  console.log('');
  console.log(pc.bold('Summary'));
  for (const outcome of report.outcomes) {
    if (outcome.status === 'installed') {
      console.log(`  ${pc.green('✓')} ${outcome.tag}`);
    } else {
      console.log(`  ${pc.red('✗')} ${outcome.tag} ${pc.dim(`(${outcome.failedStep})`)}`);
    }
  }
  console.log('');
  console.log(`  ${installed.length} installed, ${failed.length} failed`);
  console.log('');
}

/**
 * Print a fatal error with remediation and return the CLIError it became.
 * A failed command's captured output is cut to its last `outputTailLines` lines (0 = all).
 */
export function reportFatal(error: unknown, outputTailLines: number = DEFAULT_CONFIG.outputTailLines): CLIError {
  const cliError = toCLIError(error);

  if (logger.isJson) {
    console.error(JSON.stringify(cliError.toJSON(), null, 2));
    return cliError;
  }

  console.error(pc.red(`\n${cliError.toUserStringWithRemediation(logger.isVerbose)}\n`));

  if (isCommandFailedError(cliError.cause)) {
    logger.output('stdout', tailLines(cliError.cause.stdout, outputTailLines));
    logger.output('stderr', tailLines(cliError.cause.stderr, outputTailLines));
  }

  if (cliError.cause && !logger.isVerbose) {
    console.error(pc.dim(`Caused by: ${cliError.cause.message}`));
    console.error('');
  }

  return cliError;
}
