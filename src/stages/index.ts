/**
 * Pipeline stages, in execution order
 */

import { prepareStage } from "./prepare";
import { maskStage } from "./mask";
import { extractStage } from "./extract";
import { alignStage } from "./align";
import { statsStage } from "./stats";
import type { Stage } from "../types";

export { ContainerStage } from "./container-stage";
export type { ContainerStageDefinition } from "./container-stage";
export { prepareStage, maskStage, extractStage, alignStage, statsStage };

export const STAGES: readonly Stage[] = [
  prepareStage,
  maskStage,
  extractStage,
  alignStage,
  statsStage,
];
