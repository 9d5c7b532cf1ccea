/**
 * Utility exports
 */

// Errors
export {
  MinegraphError,
  ConfigurationError,
  ManifestError,
  StageError,
  formatError,
} from "./errors";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { listFastaFiles } from "./list-fasta-files";
export {
  loadManifest,
  detectManifestFormat,
  getManifestColumn,
} from "./load-manifest";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export { buildRunConfig, assertDataDir } from "./run-config";

// Process utilities
export { formatCommand, quoteArgument } from "./shell-quote";

// Classes
export { Logger } from "./logger";
export { ProcessRunner, DryRunRunner } from "./command-runner";
export { RunTracker, RUN_SUMMARY_FILENAME } from "./run-tracker";
export type { RunSummary, RunStatus } from "./run-tracker";
