/**
 * Pipeline Module
 * Runs the stages in strict order and stops at the first failure
 */

import { mkdir } from "fs/promises";
import { StageError } from "../utils";
import type { PipelineContext, Stage, StageOutcome } from "../types";

/**
 * Run each stage to completion before starting the next
 *
 * Throws StageError for the first stage that exits non-zero, is killed or
 * cannot be started; later stages are never invoked and earlier outputs
 * stay on disk.
 */
export async function execute(
  ctx: PipelineContext,
  stages: readonly Stage[],
): Promise<void> {
  const { config, logger, tracker, dryRun } = ctx;

  if (!dryRun) {
    await mkdir(config.outputDir, { recursive: true });
  }

  for (const [index, stage] of stages.entries()) {
    logger.info(`[STEP ${index + 1}/${stages.length}] ${stage.describe(ctx)}...`);

    const started = Date.now();
    let outcome: StageOutcome;
    try {
      outcome = await stage.run(ctx);
    } catch (error) {
      tracker.recordStage({
        stage: stage.id,
        status: "failed",
        exitCode: null,
        signal: null,
        duration: Date.now() - started,
      });
      throw new StageError(stage.id, null, null, { cause: error });
    }

    tracker.recordStage(outcome);

    if (outcome.status === "failed") {
      throw new StageError(stage.id, outcome.exitCode, outcome.signal);
    }

    logger.info(stage.completedMessage);
  }

  tracker.markSucceeded();
}
