/**
 * Pipeline context - flows through the entire run
 * Each module reads what it needs and writes its results back
 */

import type { PipelineSettings, RunConfig } from "./config";
import type { CommandRunner } from "./stage";
import type { Logger } from "../utils/logger";
import type { RunTracker } from "../utils/run-tracker";

export interface PipelineContext {
  // Input - provided at initialization
  config: RunConfig;
  settings: PipelineSettings;
  runner: CommandRunner;
  logger: Logger;
  tracker: RunTracker;
  dryRun?: boolean;

  files?: string[]; // Resolved FASTA filenames, written by the resolver
  manifest?: string; // Manifest column the files came from
}
