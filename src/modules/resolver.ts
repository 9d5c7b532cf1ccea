/**
 * Resolver Module
 * Determines which FASTA files the run processes
 */

import {
  ManifestError,
  getManifestColumn,
  listFastaFiles,
  loadManifest,
} from "../utils";
import type { PipelineContext } from "../types";

const EXPECTED_COLUMN = "fasta_files";

/**
 * Resolves the file set from the manifest, or from the data directory
 * when no manifest is given
 *
 * Writes to context:
 * - files: Filenames passed to the preparation stage, in order
 * - manifest: Name of the manifest column they came from
 */
export async function resolve(ctx: PipelineContext): Promise<void> {
  const { config, settings, logger, tracker } = ctx;
  let files: string[];

  if (config.metadata) {
    const manifest = await loadManifest(config.metadata);
    const column = getManifestColumn(manifest);

    if (column.name !== EXPECTED_COLUMN) {
      logger.warn(
        `Manifest column is "${column.name}", expected "${EXPECTED_COLUMN}"`,
      );
    }

    files = column.values;
    ctx.manifest = column.name;
    logger.info(`Processing selected files from ${config.metadata}`);
  } else {
    files = await listFastaFiles(config.dataDir, settings.files.extension);
    logger.info(
      `No manifest specified. Processing all FASTA files in ${config.dataDir}: ${files.join(", ")}`,
    );
  }

  if (files.length === 0) {
    throw new ManifestError(
      config.metadata
        ? `Manifest ${config.metadata} lists no files`
        : `No files ending in ${settings.files.extension} found in ${config.dataDir}`,
      config.metadata,
    );
  }

  tracker.setFiles(files);
  ctx.files = files;
}
