/**
 * List command - show which tags would be built, without touching the checkout
 */

import pc from 'picocolors';
import {
  DEFAULT_CONFIG,
  GitRepository,
  createProcessRunner,
  minorLineOf,
  resolveBounds,
  selectLatestMinorVersions,
  type ProcessRunner,
  type VersionTag,
} from '@minorbuild/core';
import { CLIError, ErrorCodes } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { resolveRunContext, type RunContext, type SelectionOptions } from '../lib/options.js';
import { reportFatal } from '../lib/report.js';

export async function runList(
  options: SelectionOptions,
  runner: ProcessRunner = createProcessRunner(),
  context?: RunContext
): Promise<VersionTag[]> {
  const { repoDir, config } = context ?? (await resolveRunContext(options));
  const repo = new GitRepository(repoDir, runner);

  if (!repo.isRepository()) {
    throw new CLIError(ErrorCodes.GIT_NOT_A_REPOSITORY, `Not a git repository: ${repoDir}`);
  }

  return selectLatestMinorVersions(repo.listTags(), {
    bounds: resolveBounds(config),
    marker: config.tagMarker,
  });
}

export async function listCommand(options: SelectionOptions): Promise<void> {
  let outputTailLines = DEFAULT_CONFIG.outputTailLines;
  try {
    const context = await resolveRunContext(options);
    outputTailLines = context.config.outputTailLines;
    const selected = await runList(options, createProcessRunner(), context);

    if (options.json) {
      console.log(
        JSON.stringify(
          selected.map((entry) => ({ tag: entry.tag, version: entry.version.version, line: minorLineOf(entry.version) })),
          null,
          2
        )
      );
      return;
    }

    if (selected.length === 0) {
      logger.warn('No release tags matched the version bounds');
      return;
    }

    for (const entry of selected) {
      console.log(`  ${pc.bold(minorLineOf(entry.version).padEnd(6))} ${entry.tag}`);
    }
  } catch (error) {
    reportFatal(error, outputTailLines);
    process.exit(1);
  }
}
