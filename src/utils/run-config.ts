import { stat } from "fs/promises";
import path from "node:path";
import { ConfigurationError } from "./errors";
import type { PipelineSettings, RunConfig, RunOptions } from "../types";

/**
 * Build the run configuration from validated CLI options
 * Options left unset fall back to the settings defaults; the quantile
 * arrives as a percent and is stored as a fraction
 */
export function buildRunConfig(
  options: RunOptions,
  settings: PipelineSettings,
): RunConfig {
  const { defaults } = settings;
  const quantilePercent = options.quantile ?? defaults.quantile;

  return {
    dataDir: path.resolve(options.data_dir),
    outputDir: path.resolve(options.output_dir),
    metadata: options.metadata,
    threads: options.threads ?? defaults.threads,
    treePars: options.tree_pars ?? defaults.treePars,
    treeBs: options.tree_bs ?? defaults.treeBs,
    quantile: quantilePercent / 100,
    topN: options.top_n ?? defaults.topN,
  };
}

/**
 * Ensure the input directory exists before anything else happens
 */
export async function assertDataDir(config: RunConfig): Promise<void> {
  const info = await stat(config.dataDir).catch(() => null);

  if (!info) {
    throw new ConfigurationError(
      `Data directory does not exist: ${config.dataDir}`,
    );
  }
  if (!info.isDirectory()) {
    throw new ConfigurationError(
      `Data directory is not a directory: ${config.dataDir}`,
    );
  }
}
