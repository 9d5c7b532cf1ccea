import { ContainerStage, outputMount } from "./container-stage";

export const alignStage = new ContainerStage({
  id: "align",
  describe: (ctx) => `Running PGGB with ${ctx.config.threads} threads`,
  completedMessage: "PGGB alignment and graph generation completed.",
  image: (ctx) => ctx.settings.images.toolkit,
  mounts: (ctx) => [outputMount(ctx)],
  args: (ctx) => ["python", "/run_pggb.py", String(ctx.config.threads)],
});
