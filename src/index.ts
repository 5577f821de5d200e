/**
 * condaci
 *
 * CI helper that provisions Miniconda on a build agent, builds conda
 * recipes and uploads the packages to binstar channels chosen from the
 * branch/tag state of the build.
 *
 * Boundary Statement:
 * - One external command at a time, no retries, no rollback
 * - No credential storage; the upload key comes from the command line
 * - Package internals are left to conda-build
 */

// Contracts
export {
  CommandSchema,
  CiStateSchema,
  CiEnvSchema,
  UploadTargetSchema,
  ToolConfigSchema,
} from './contracts/index.js';

export type {
  Command,
  CiState,
  UploadTarget,
  ToolConfig,
} from './contracts/index.js';

// Configuration
export {
  loadToolConfig,
  defaultToolConfig,
  condaBin,
  binstarBin,
  DEFAULT_INSTALLER_FILE,
  DEFAULT_PYTHON,
  DEFAULT_PLUGINS,
} from './config/index.js';

export { readCiState } from './ci/index.js';

// Provisioning
export { buildSetupCommands, setupMiniconda, type SetupOptions } from './setup/index.js';

// Building
export { buildPackage, resolveBuildOutputPath, type BuildOptions } from './build/index.js';

// Uploading
export {
  buildAndUpload,
  canUpload,
  resolveChannel,
  binstarUpload,
  buildUploadCommand,
  RELEASE_CHANNEL,
  KEY_PLACEHOLDER,
  type BuildAndUploadOptions,
  type BuildAndUploadResult,
} from './upload/index.js';
export type { PublishOptions } from './upload/publisher.js';

// Runner infrastructure
export * from './runner/index.js';

// CLI
export { createProgram, VERSION, type ProgramDeps } from './program.js';
