/**
 * Turn command-line options into a repository path and an effective BuildConfig.
 */

import { existsSync } from 'fs';
import {
  loadConfig,
  resolveBounds,
  resolveTargetPath,
  type BuildConfig,
} from '@minorbuild/core';
import { CLIError, ErrorCodes } from './errors.js';

export interface SelectionOptions {
  repoDir?: string;
  min?: string;
  max?: string;
  marker?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
}

export interface InstallOptions extends SelectionOptions {
  pull?: boolean;
  systemDeps?: boolean;
  dryRun?: boolean;
  strict?: boolean;
}

export interface RunContext {
  repoDir: string;
  config: BuildConfig;
}

/**
 * Flags given on the command line win over the config file.
 */
export function applyOverrides(config: BuildConfig, options: InstallOptions): BuildConfig {
  return {
    ...config,
    minimumVersion: options.min ?? config.minimumVersion,
    maximumVersion: options.max ?? config.maximumVersion,
    tagMarker: options.marker ?? config.tagMarker,
    pull: options.pull ?? config.pull,
    installSystemDependencies: options.systemDeps ?? config.installSystemDependencies,
  };
}

export async function resolveRunContext(options: InstallOptions): Promise<RunContext> {
  if (!options.repoDir) {
    throw new CLIError(ErrorCodes.CLI_MISSING_ARGUMENT, 'Missing --repo-dir <path>');
  }

  const repoDir = resolveTargetPath(options.repoDir);
  if (!existsSync(repoDir)) {
    throw new CLIError(ErrorCodes.GIT_NOT_A_REPOSITORY, `Repository directory not found: ${repoDir}`);
  }

  if (options.config && !existsSync(resolveTargetPath(options.config))) {
    throw new CLIError(ErrorCodes.CONFIG_NOT_FOUND, `Config file not found: ${resolveTargetPath(options.config)}`);
  }

  const loaded = await loadConfig({
    configPath: options.config,
    searchDirs: [repoDir, process.cwd()],
  });
  const config = applyOverrides(loaded, options);

  if (config.tagMarker.length > 1) {
    throw new CLIError(
      ErrorCodes.CLI_INVALID_ARGUMENT,
      `Tag marker must be a single character, got "${config.tagMarker}"`
    );
  }

  // Surface bad bounds before anything touches the repository
  const { minimum, maximum } = resolveBounds(config);
  if (minimum && maximum && minimum.compare(maximum) > 0) {
    throw new CLIError(
      ErrorCodes.CLI_INVALID_ARGUMENT,
      `Minimum version ${minimum.version} is greater than maximum version ${maximum.version}`
    );
  }

  return { repoDir, config };
}
