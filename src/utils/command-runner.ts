/**
 * Command Runners
 * Execute (or preview) the container invocations built by the stages
 */

import { spawn } from "node:child_process";
import { formatCommand } from "./shell-quote";
import type { Logger } from "./logger";
import type { CommandResult, CommandRunner, CommandSpec } from "../types";

/**
 * Spawns the command and waits for it to exit
 * There is no timeout: a hung process hangs the run
 */
export class ProcessRunner implements CommandRunner {
  constructor(private logger: Logger) {}

  run(spec: CommandSpec): Promise<CommandResult> {
    this.logger.debug(`$ ${formatCommand(spec.command, spec.args)}`);

    return new Promise((resolve, reject) => {
      const child = spawn(spec.command, spec.args, {
        stdio: spec.quiet ? "ignore" : "inherit",
      });

      child.on("error", reject);
      child.on("close", (exitCode, signal) => {
        resolve({ exitCode, signal });
      });
    });
  }
}

/**
 * Prints each command instead of running it
 */
export class DryRunRunner implements CommandRunner {
  constructor(private logger: Logger) {}

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.logger.info(`[DRY RUN] ${formatCommand(spec.command, spec.args)}`);
    return { exitCode: 0, signal: null };
  }
}
