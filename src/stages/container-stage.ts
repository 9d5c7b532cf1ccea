/**
 * Container Stage
 * One external tool run inside the container runtime
 */

import type {
  CommandSpec,
  Mount,
  PipelineContext,
  Stage,
  StageId,
  StageOutcome,
} from "../types";

export interface ContainerStageDefinition {
  id: StageId;
  describe: (ctx: PipelineContext) => string;
  completedMessage: string;
  image: (ctx: PipelineContext) => string;
  mounts: (ctx: PipelineContext) => Mount[];
  args: (ctx: PipelineContext) => string[];
  // Discard the tool's stdout/stderr
  quiet?: boolean;
}

export class ContainerStage implements Stage {
  readonly id: StageId;
  readonly completedMessage: string;

  constructor(private definition: ContainerStageDefinition) {
    this.id = definition.id;
    this.completedMessage = definition.completedMessage;
  }

  describe(ctx: PipelineContext): string {
    return this.definition.describe(ctx);
  }

  /**
   * Build `<runtime> run --rm [extra] -v host:container... <image> <args...>`
   */
  buildCommand(ctx: PipelineContext): CommandSpec {
    const { container } = ctx.settings;
    const volumes = this.definition
      .mounts(ctx)
      .flatMap(({ host, container: target }) => ["-v", `${host}:${target}`]);

    return {
      command: container.runtime,
      args: [
        "run",
        "--rm",
        ...container.extraArgs,
        ...volumes,
        this.definition.image(ctx),
        ...this.definition.args(ctx),
      ],
      quiet: this.definition.quiet ?? false,
    };
  }

  async run(ctx: PipelineContext): Promise<StageOutcome> {
    const started = Date.now();
    const { exitCode, signal } = await ctx.runner.run(this.buildCommand(ctx));

    return {
      stage: this.id,
      status: exitCode === 0 ? "succeeded" : "failed",
      exitCode,
      signal,
      duration: Date.now() - started,
    };
  }
}

/**
 * Host output directory mounted at the canonical output path
 */
export function outputMount(ctx: PipelineContext): Mount {
  return { host: ctx.config.outputDir, container: ctx.settings.mounts.output };
}

/**
 * Path inside the container, relative to the output mount
 */
export function inOutput(ctx: PipelineContext, ...segments: string[]): string {
  return [ctx.settings.mounts.output, ...segments].join("/");
}
