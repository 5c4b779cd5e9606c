import { isStublayerError } from "../../shared/errors.js";
import { errorMessage, logEvent } from "../../shared/log.js";
import { inspectModules } from "../../stubs/orchestrator.js";
import { consoleIo, formatInspection, type CommandIo } from "../output.js";
import { loadRunContext, type RunContextOptions } from "../run-context.js";

export interface StatusCommandOptions extends RunContextOptions {
  module?: string;
  io?: CommandIo;
}

/**
 * `stublayer status [module]`: resolved versions and staleness, no side effects.
 */
export function runStatusCommand(options: StatusCommandOptions = {}): number {
  const io = options.io ?? consoleIo;

  try {
    const ctx = loadRunContext(options);
    const report = inspectModules(ctx, { only: options.module });
    if (report.length === 0) {
      io.out("no-modules: true");
      return 0;
    }
    io.out(report.map(formatInspection).join("\n\n"));
    return 0;
  } catch (err) {
    if (!isStublayerError(err)) {
      logEvent("error", "command-failed", { error: errorMessage(err) });
    }
    io.err(`error: ${errorMessage(err)}`);
    return 1;
  }
}
