/**
 * Central type exports
 */

// Configuration
export type {
  ContainerConfig,
  ImagesConfig,
  MountsConfig,
  FilesConfig,
  RepeatMaskerConfig,
  DefaultsConfig,
  LoggingConfig,
  LogLevel,
  PipelineSettings,
  PartialPipelineSettings,
  RunOptions,
  RunConfig,
  ConfigError,
} from "./config";
export {
  PipelineSettingsSchema,
  PartialPipelineSettingsSchema,
  RunOptionsSchema,
} from "./config";

// Manifest
export type { ManifestFormat, ManifestColumn, Manifest } from "./manifest";

// Stages
export type {
  StageId,
  CommandSpec,
  CommandResult,
  CommandRunner,
  StageStatus,
  StageOutcome,
  Stage,
  Mount,
} from "./stage";

// Context
export type { PipelineContext } from "./context";
