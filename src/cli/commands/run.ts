/**
 * Run command - Loads settings, resolves the file set and runs the stages
 */

import ora from "ora";
import type { z } from "zod";
import {
  loadConfig,
  buildRunConfig,
  assertDataDir,
  formatError,
  Logger,
  ProcessRunner,
  DryRunRunner,
  RunTracker,
} from "../../utils";
import * as modules from "../../modules";
import { STAGES } from "../../stages";
import { RunOptionsSchema } from "../../types";
import type { PipelineContext } from "../../types";

// As commander hands them over: any flag may be missing until validated
type Options = Partial<z.input<typeof RunOptionsSchema>>;

export async function runCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Loading settings...", indent: 2 }).start();
  const logger = new Logger();
  let ctx: PipelineContext | undefined;

  try {
    // Validate CLI options
    const options = RunOptionsSchema.parse(opts);

    // Load settings (default → user → custom)
    const { config: settings, errors } = await loadConfig(options.config);
    logger.setLevel(options.verbose ? "debug" : settings.logging.level);

    const config = buildRunConfig(options, settings);
    await assertDataDir(config);

    ctx = {
      config,
      settings,
      logger,
      tracker: new RunTracker(),
      runner: options.dryRun ? new DryRunRunner(logger) : new ProcessRunner(logger),
      dryRun: options.dryRun,
    };

    spinner.text = "Resolving input files...";
    await modules.resolve(ctx);
    spinner.succeed(`Resolved ${ctx.files?.length ?? 0} FASTA files`);

    // Settings layers that failed are skipped, not fatal
    for (const err of errors) {
      logger.warn(`Ignoring settings file ${err.path}: ${formatError(err.error)}`);
    }

    logger.info(
      `Starting workflow with data directory ${config.dataDir} and output directory ${config.outputDir}`,
    );
    logger.info(`Running with ${config.threads} threads.`);

    await modules.execute(ctx, STAGES);
    await modules.summary(ctx, STAGES);
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail("Workflow aborted");
    }
    logger.error(formatError(error), error);

    if (ctx) {
      ctx.tracker.markFailed(formatError(error));
      await modules.summary(ctx, STAGES).catch((summaryError: unknown) => {
        logger.error(`Failed to write run summary: ${formatError(summaryError)}`);
      });
    }

    process.exit(1);
  }
}
