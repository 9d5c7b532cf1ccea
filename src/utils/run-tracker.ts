/**
 * Run Tracker
 * Records stage outcomes and exports the run summary
 */

import { writeFile } from "fs/promises";
import { join } from "path";
import type { StageId, StageOutcome } from "../types";

export const RUN_SUMMARY_FILENAME = "minegraph-run.json";

export type RunStatus = "running" | "succeeded" | "failed";

export interface RunSummary {
  status: RunStatus;
  files: string[];
  stages: StageOutcome[];
  failedStage?: StageId;
  error?: string;
  startTime: string;
  duration: number;
}

export class RunTracker {
  private files: string[] = [];
  private outcomes: StageOutcome[] = [];
  private status: RunStatus = "running";
  private error?: string;
  private startTime = new Date();

  // ============================================================================
  // Recording
  // ============================================================================

  setFiles(files: string[]): void {
    this.files = [...files];
  }

  recordStage(outcome: StageOutcome): void {
    this.outcomes.push(outcome);
  }

  markSucceeded(): void {
    this.status = "succeeded";
  }

  markFailed(message: string): void {
    this.status = "failed";
    this.error = message;
  }

  // ============================================================================
  // Results
  // ============================================================================

  getOutcomes(): StageOutcome[] {
    return this.outcomes;
  }

  getSummary(): RunSummary {
    const failed = this.outcomes.find((o) => o.status === "failed");

    return {
      status: this.status,
      files: this.files,
      stages: this.outcomes,
      failedStage: failed?.stage,
      error: this.error,
      startTime: this.startTime.toISOString(),
      duration: Date.now() - this.startTime.getTime(),
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportSummary(outputDir: string): Promise<string> {
    const outputPath = join(outputDir, RUN_SUMMARY_FILENAME);
    await writeFile(
      outputPath,
      JSON.stringify(this.getSummary(), null, 2),
      "utf-8",
    );
    return outputPath;
  }
}
