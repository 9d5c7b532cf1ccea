#!/usr/bin/env tsx

/**
 * CLI entry point for the MineGraph workflow driver
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { runCommand } from "./commands/run";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("minegraph")
  .description(
    "Run the MineGraph workflow: FASTA preparation, RepeatMasker, PGGB graph construction and graph statistics",
  )
  .version("0.1.0");

// Main workflow command (default action)
program
  .option("--data_dir <path>", "Directory containing the raw FASTA files")
  .option("--output_dir <path>", "Directory where results are written")
  .option(
    "--metadata <path>",
    "CSV, TSV or XLSX file with a single 'fasta_files' column (default: all FASTA files in data_dir)",
  )
  .option("--threads <int>", "Threads for RepeatMasker, PGGB and statistics (default: 16)")
  .option("--tree_pars <int>", "Number of parsimonious trees (default: 10)")
  .option("--tree_bs <int>", "Number of bootstrap trees (default: 10)")
  .option("--quantile <percent>", "Node quantile threshold in percent (default: 25)")
  .option("--top_n <int>", "Number of top nodes to visualize (default: 50)")
  .option("-c, --config <path>", "Path to custom settings file")
  .option("--dry-run", "Print the container commands without running them")
  .option("-v, --verbose", "Verbose output")
  .action(runCommand);

// Config command - show config location
program
  .command("config")
  .description("Show settings file location")
  .action(configCommand);

program.parse();
