import { ContainerStage, inOutput, outputMount } from "./container-stage";

/**
 * Graph statistics, phylogenetic trees and top-node visualization
 */
export const statsStage = new ContainerStage({
  id: "stats",
  describe: () =>
    "Performing statistical analysis on generated graph and alignments",
  completedMessage: "Statistical analysis completed.",
  image: (ctx) => ctx.settings.images.toolkit,
  mounts: (ctx) => [outputMount(ctx)],
  args: (ctx) => {
    const { config, settings } = ctx;
    return [
      "python",
      "/run_stats.py",
      "--threads",
      String(config.threads),
      "--tree_pars",
      String(config.treePars),
      "--tree_bs",
      String(config.treeBs),
      "--quantile",
      String(config.quantile),
      "--top_n",
      String(config.topN),
      "--input_dir",
      inOutput(ctx, settings.files.alignmentDir),
      "--output_dir",
      inOutput(ctx, settings.files.statsDir),
    ];
  },
});
