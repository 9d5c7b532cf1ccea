import { ContainerStage, inOutput, outputMount } from "./container-stage";
import { quoteArgument } from "../utils";

/**
 * RepeatMasker over the downsampled FASTA; its own output is discarded
 */
export const maskStage = new ContainerStage({
  id: "mask",
  describe: () => "Running RepeatMasker on downsampled FASTA",
  completedMessage: "RepeatMasker analysis completed.",
  image: (ctx) => ctx.settings.images.repeatMasker,
  mounts: (ctx) => [outputMount(ctx)],
  args: (ctx) => [
    "bash",
    "-c",
    [
      "RepeatMasker",
      `-species ${quoteArgument(ctx.settings.repeatMasker.species)}`,
      `-s ${quoteArgument(inOutput(ctx, ctx.settings.files.downsampledFasta))}`,
      `-pa ${ctx.config.threads}`,
      "-no_is",
    ].join(" "),
  ],
  quiet: true,
});
