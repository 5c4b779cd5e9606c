import { Command } from "commander";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { runBuildCommand, runStatusCommand } from "./commands/index.js";

function readPackageVersion(): string {
  // Works from both `src/` (dev) and `dist/` (built) by walking up until the
  // nearest package.json is found.
  let current = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    const packageJsonPath = path.join(current, "package.json");
    if (fs.existsSync(packageJsonPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
      if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
        const { version } = parsed;
        if (typeof version === "string" && version.trim()) return version.trim();
      }
    }

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return "0.0.0";
}

interface CommonOptions {
  config?: string;
  debug?: boolean;
}

const program = new Command();

program
  .name("stublayer")
  .description("Build layered type stub overlays for a project's dependencies")
  .version(readPackageVersion());
program.helpCommand(false);

program
  .command("build")
  .description("Regenerate stale stubs and merge overlays into the output tree")
  .argument("[module]", "Only process this module")
  .option("--clean", "Remove previous output and build records instead of building")
  .option("--config <path>", "Config file (default: ./.stublayer.json)")
  .option("--debug", "Include debug fields in log lines")
  .addHelpText(
    "after",
    [
      "",
      "Layers (later wins per file):",
      "  1. generated      stubgen output, regenerated only when the module version changes",
      "  2. user-global    $STUBLAYER_HOME/overlays/<X.Y or X>/<module>/<package>/",
      "  3. project-local  <output-directory>/.local/<module>/",
      "",
    ].join("\n")
  )
  .action(async (module: string | undefined, options: CommonOptions & { clean?: boolean }) => {
    process.exitCode = await runBuildCommand({
      module,
      clean: Boolean(options.clean),
      configFile: options.config,
      debug: Boolean(options.debug),
    });
  });

program
  .command("status")
  .description("Show resolved versions and which modules are stale")
  .argument("[module]", "Only show this module")
  .option("--config <path>", "Config file (default: ./.stublayer.json)")
  .option("--debug", "Include debug fields in log lines")
  .action((module: string | undefined, options: CommonOptions) => {
    process.exitCode = runStatusCommand({
      module,
      configFile: options.config,
      debug: Boolean(options.debug),
    });
  });

export { program };
