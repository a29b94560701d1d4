/**
 * @minorbuild/core
 *
 * Selects the newest release of each interpreter minor line from a git
 * checkout and builds them one after another. No terminal output; callers
 * observe progress through BuildProgressCallback.
 */

// Version selection
export {
  DEFAULT_TAG_MARKER,
  InvalidVersionError,
  groupByMinorLine,
  isWithinBounds,
  minorLineOf,
  parseVersionBound,
  parseVersionTag,
  selectLatestMinorVersions,
  type SelectOptions,
  type VersionBounds,
  type VersionTag,
} from './versions.js';

// Process execution
export {
  CommandFailedError,
  command,
  createProcessRunner,
  formatCommand,
  isCommandFailedError,
  runChecked,
  tailLines,
  type CommandResult,
  type CommandSpec,
  type ProcessRunner,
  type RunOptions,
} from './process.js';

// Git
export { GitRepository, describeRef, type RecordedRef } from './git.js';

// Distro detection
export {
  DEFAULT_OS_RELEASE_PATH,
  DISTRO_FAMILIES,
  UnsupportedDistroError,
  detectDistroFamily,
  installSystemDependencies,
  parseOsRelease,
  readDistroFamily,
  systemDependencyCommands,
  type DistroFamily,
} from './distro.js';

// Configuration
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  mergeConfig,
  resolveTargetPath,
  validateConfig,
  type BuildConfig,
} from './config.js';

// Build driver
export {
  buildAllMinorVersions,
  buildSteps,
  buildVersion,
  resolveBounds,
  type BuildOptions,
  type BuildProgressCallback,
  type BuildProgressEvent,
  type BuildReport,
  type BuildStep,
  type FailedOutcome,
  type InstalledOutcome,
  type RestoreStatus,
  type StepPlan,
  type TagOutcome,
} from './builder.js';
