import { ContainerStage, outputMount } from "./container-stage";

/**
 * Merge, compress and downsample the selected FASTA files
 */
export const prepareStage = new ContainerStage({
  id: "prepare",
  describe: () => "Running FASTA preparation and mash input",
  completedMessage: "FASTA preparation and mash input completed.",
  image: (ctx) => ctx.settings.images.toolkit,
  mounts: (ctx) => [
    { host: ctx.config.dataDir, container: ctx.settings.mounts.data },
    outputMount(ctx),
  ],
  args: (ctx) => [
    "python",
    "/prepare_and_mash_input.py",
    ctx.settings.mounts.data,
    ctx.settings.mounts.output,
    ...(ctx.files ?? []),
  ],
});
