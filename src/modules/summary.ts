/**
 * Summary Module
 * Exports the run summary and displays stage results
 */

import chalk from "chalk";
import type { PipelineContext, Stage, StageOutcome } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m ${(seconds % 60).toFixed(0)}s`;
  }
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

function stageRow(id: string, outcome?: StageOutcome): string {
  const label = chalk.dim(id.padEnd(10));

  if (!outcome) {
    return `   ${chalk.dim("○")} ${label} ${chalk.dim("not run")}`;
  }
  if (outcome.status === "succeeded") {
    return `   ${chalk.green("◉")} ${label} ${chalk.green(formatDuration(outcome.duration))}`;
  }

  const reason = outcome.signal
    ? `killed by ${outcome.signal}`
    : outcome.exitCode === null
      ? "failed to start"
      : `exit code ${outcome.exitCode}`;
  return `   ${chalk.red("✖")} ${label} ${chalk.red(reason)}`;
}

// ============================================================================
// Main Summary Display
// ============================================================================

/**
 * Export the run summary to the output directory (skipped on dry runs)
 * and print one row per stage
 */
export async function summary(
  ctx: PipelineContext,
  stages: readonly Stage[],
): Promise<void> {
  const { config, tracker, logger, dryRun } = ctx;
  const result = tracker.getSummary();

  if (!dryRun && result.stages.length > 0) {
    const summaryPath = await tracker.exportSummary(config.outputDir);
    logger.debug(`Run summary written to ${summaryPath}`);
  }

  const outcomes = new Map(result.stages.map((o) => [o.stage, o]));

  console.log("");
  console.log(`  ${chalk.bold.white("Stages")}`);
  for (const stage of stages) {
    console.log(stageRow(stage.id, outcomes.get(stage.id)));
  }
  console.log(
    `   ${chalk.dim("files".padEnd(12))}${result.files.length} ${chalk.dim("·")} ${chalk.dim(formatDuration(result.duration))}`,
  );
  console.log("");

  if (result.status !== "succeeded") {
    return;
  }

  if (dryRun) {
    console.log(`  ${chalk.yellow("◆")} ${chalk.bold("Dry run complete")} ${chalk.dim("· no stage was executed")}`);
  } else {
    console.log(
      `  ${chalk.green("✔")} ${chalk.bold("[WORKFLOW COMPLETE]")} All steps finished successfully. Results are in ${config.outputDir}`,
    );
  }
  console.log("");
}
