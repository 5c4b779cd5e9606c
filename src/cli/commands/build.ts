import { isStublayerError } from "../../shared/errors.js";
import { errorMessage, logEvent } from "../../shared/log.js";
import { createStubgenGenerator, type StubGenerator } from "../../stubs/generator.js";
import { resolveHostVersion } from "../../stubs/host-version.js";
import { runBuild, runClean } from "../../stubs/orchestrator.js";
import { withRunLock } from "../../stubs/run-lock.js";
import { consoleIo, formatBuildSummary, formatCleanSummary, type CommandIo } from "../output.js";
import { loadRunContext, type RunContextOptions } from "../run-context.js";

export interface BuildCommandOptions extends RunContextOptions {
  module?: string;
  clean?: boolean;
  /** Replaces the configured stubgen invocation. */
  generator?: StubGenerator;
  io?: CommandIo;
}

/**
 * `stublayer build [module] [--clean]`. Returns the process exit code.
 */
export async function runBuildCommand(options: BuildCommandOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;

  try {
    const ctx = loadRunContext(options);

    return await withRunLock(ctx.paths.lockPath, async () => {
      if (options.clean) {
        const summary = runClean({ specs: ctx.specs, paths: ctx.paths, records: ctx.records }, { only: options.module });
        io.out(formatCleanSummary(summary));
        return summary.ok ? 0 : 1;
      }

      const hostVersion = await resolveHostVersion({
        pythonVersion: ctx.config.pythonVersion,
        python: ctx.config.python,
      });
      const generator =
        options.generator ??
        createStubgenGenerator({ command: ctx.config.generator.command, args: ctx.config.generator.args });

      const summary = await runBuild(
        {
          specs: ctx.specs,
          manifest: ctx.manifest,
          paths: ctx.paths,
          userOverlaysDir: ctx.userPaths.overlaysDir,
          hostVersion,
          records: ctx.records,
          generator,
        },
        { only: options.module }
      );
      io.out(formatBuildSummary(summary));
      return summary.ok ? 0 : 1;
    });
  } catch (err) {
    if (!isStublayerError(err)) {
      logEvent("error", "command-failed", { error: errorMessage(err) });
    }
    io.err(`error: ${errorMessage(err)}`);
    return 1;
  }
}
