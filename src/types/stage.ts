/**
 * Stage and process execution types
 */

import type { PipelineContext } from "./context";

export type StageId = "prepare" | "mask" | "extract" | "align" | "stats";

export interface CommandSpec {
  command: string;
  args: string[];
  // Discard the process's stdout/stderr instead of inheriting them
  quiet: boolean;
}

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

export type StageStatus = "succeeded" | "failed";

export interface StageOutcome {
  stage: StageId;
  status: StageStatus;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  duration: number; // Milliseconds
}

export interface Stage {
  readonly id: StageId;
  readonly completedMessage: string;
  // Progress line shown before the stage starts
  describe(ctx: PipelineContext): string;
  run(ctx: PipelineContext): Promise<StageOutcome>;
}

export interface Mount {
  host: string;
  container: string;
}
