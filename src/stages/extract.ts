import { ContainerStage, outputMount } from "./container-stage";

export const extractStage = new ContainerStage({
  id: "extract",
  describe: () => "Extracting longest tandem repeat and updating parameters",
  completedMessage:
    "Longest tandem repeat extraction completed and params.yaml updated.",
  image: (ctx) => ctx.settings.images.toolkit,
  mounts: (ctx) => [outputMount(ctx)],
  args: (ctx) => ["python", "/run_repeatmask.py", ctx.settings.mounts.output],
});
