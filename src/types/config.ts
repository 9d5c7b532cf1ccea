/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ContainerConfigSchema = z.object({
  runtime: z.string().min(1),
  // Passed verbatim after `run --rm` (e.g. ["--user", "1000:1000"])
  extraArgs: z.array(z.string()),
});

export const ImagesConfigSchema = z.object({
  toolkit: z.string().min(1),
  repeatMasker: z.string().min(1),
});

export const MountsConfigSchema = z.object({
  data: z.string().startsWith("/"),
  output: z.string().startsWith("/"),
});

export const FilesConfigSchema = z.object({
  extension: z.string().min(1),
  downsampledFasta: z.string().min(1),
  alignmentDir: z.string().min(1),
  statsDir: z.string().min(1),
});

export const RepeatMaskerConfigSchema = z.object({
  species: z.string().min(1),
});

export const DefaultsConfigSchema = z.object({
  threads: z.number().int().positive(),
  treePars: z.number().int().positive(),
  treeBs: z.number().int().positive(),
  quantile: z.number().int().min(1).max(100), // Percent
  topN: z.number().int().positive(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const PipelineSettingsSchema = z.object({
  container: ContainerConfigSchema,
  images: ImagesConfigSchema,
  mounts: MountsConfigSchema,
  files: FilesConfigSchema,
  repeatMasker: RepeatMaskerConfigSchema,
  defaults: DefaultsConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialPipelineSettingsSchema = z.object({
  container: ContainerConfigSchema.partial().optional(),
  images: ImagesConfigSchema.partial().optional(),
  mounts: MountsConfigSchema.partial().optional(),
  files: FilesConfigSchema.partial().optional(),
  repeatMasker: RepeatMaskerConfigSchema.partial().optional(),
  defaults: DefaultsConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Options as they arrive from commander (numbers are still strings)
export const RunOptionsSchema = z.object({
  data_dir: z.string({ required_error: "--data_dir is required" }).min(1),
  output_dir: z.string({ required_error: "--output_dir is required" }).min(1),
  metadata: z.string().min(1).optional(),
  threads: z.coerce.number().int().positive().optional(),
  tree_pars: z.coerce.number().int().positive().optional(),
  tree_bs: z.coerce.number().int().positive().optional(),
  quantile: z.coerce.number().int().min(1).max(100).optional(),
  top_n: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

// Infer TypeScript types from Zod schemas
export type ContainerConfig = z.infer<typeof ContainerConfigSchema>;
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type MountsConfig = z.infer<typeof MountsConfigSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type RepeatMaskerConfig = z.infer<typeof RepeatMaskerConfigSchema>;
export type DefaultsConfig = z.infer<typeof DefaultsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>;
export type PartialPipelineSettings = z.infer<
  typeof PartialPipelineSettingsSchema
>;
export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Run configuration - built once from CLI options and settings defaults,
 * read-only for the rest of the run
 */
export interface RunConfig {
  dataDir: string; // Absolute
  outputDir: string; // Absolute
  metadata?: string;
  threads: number;
  treePars: number;
  treeBs: number;
  quantile: number; // Fraction in (0, 1]
  topN: number;
}

export interface ConfigError {
  path: string;
  error: unknown;
}
