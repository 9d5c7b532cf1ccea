/**
 * Error types
 * Every error is fatal to the run; the CLI command is the only place they are caught
 */

import { ZodError } from "zod";
import type { StageId } from "../types";

export class MinegraphError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid arguments or settings, detected before any stage runs
 */
export class ConfigurationError extends MinegraphError {}

/**
 * Unreadable manifest, unsupported format, wrong column count or empty file list
 */
export class ManifestError extends MinegraphError {
  constructor(
    message: string,
    readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * External stage exited non-zero, was killed, or could not be spawned
 */
export class StageError extends MinegraphError {
  constructor(
    readonly stage: StageId,
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    options?: { cause?: unknown },
  ) {
    super(describeStageFailure(stage, exitCode, signal, options?.cause), options);
  }
}

function describeStageFailure(
  stage: StageId,
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  cause: unknown,
): string {
  if (cause !== undefined) {
    const details = cause instanceof Error ? cause.message : String(cause);
    return `Stage "${stage}" could not be started: ${details}`;
  }
  if (signal) {
    return `Stage "${stage}" was terminated by ${signal}`;
  }
  return `Stage "${stage}" exited with code ${exitCode}`;
}

/**
 * Flatten any thrown value into a single readable line
 */
export function formatError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
