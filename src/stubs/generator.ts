import { spawn } from "node:child_process";
import * as path from "node:path";

import { DEFAULT_GENERATOR_OUT_DIRNAME, GENERATOR_DIAGNOSTICS_MAX_CHARS } from "../shared/defaults.js";
import { GenerationError } from "../shared/errors.js";
import { ensureDirectory } from "../shared/fs-utils.js";
import { errorMessage, logEvent } from "../shared/log.js";
import { readStubTree, type StubTree } from "./stub-tree.js";

export interface StubGenerator {
  /**
   * Produce the raw stub tree for `packageName`, using `workspacePath` as scratch space.
   * Rejects with GenerationError when the tool fails.
   */
  generate(packageName: string, workspacePath: string): Promise<StubTree>;
}

export interface StubgenGeneratorOptions {
  command: string;
  /** Extra arguments placed before `-p <package> -o <dir>`. */
  args?: readonly string[];
  env?: NodeJS.ProcessEnv;
}

export function buildStubgenArgs(params: {
  extraArgs: readonly string[];
  packageName: string;
  outDir: string;
}): string[] {
  return [...params.extraArgs, "-p", params.packageName, "-o", params.outDir];
}

function truncateDiagnostics(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length <= GENERATOR_DIAGNOSTICS_MAX_CHARS) return trimmed;
  return `${trimmed.slice(0, GENERATOR_DIAGNOSTICS_MAX_CHARS)}...`;
}

function runGeneratorProcess(params: {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  packageName: string;
}): Promise<void> {
  const { command, packageName } = params;

  return new Promise<void>((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    const settle = (err: GenerationError | null) => {
      if (settled) return;
      settled = true;
      if (err) reject(err);
      else resolve();
    };

    const child = spawn(command, params.args, {
      cwd: params.cwd,
      env: params.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    child.stdout.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    child.on("close", (code, closeSignal) => {
      const stdout = Buffer.concat(stdoutChunks).toString("utf-8");
      const stderr = Buffer.concat(stderrChunks).toString("utf-8");
      const diagnostics = truncateDiagnostics(stderr.trim() ? stderr : stdout);

      if (code === null) {
        const sig = closeSignal ?? "unknown-signal";
        settle(new GenerationError(`${command} terminated by signal: ${sig}`, packageName, diagnostics));
        return;
      }

      if (code !== 0) {
        logEvent("warn", "generator-exit-nonzero", {
          package: packageName,
          "exit-code": code,
          stderr: stderr.slice(0, 500),
        });
        settle(new GenerationError(`${command} exited with code ${code}`, packageName, diagnostics));
        return;
      }

      settle(null);
    });

    child.on("error", (err) => {
      settle(new GenerationError(`Failed to spawn ${command}: ${errorMessage(err)}`, packageName, ""));
    });
  });
}

/**
 * Runs `stubgen -p <package> -o <workspace>/out` (or a configured equivalent) and reads
 * the produced tree back. An empty output directory is a successful, empty result.
 */
export function createStubgenGenerator(options: StubgenGeneratorOptions): StubGenerator {
  const extraArgs = options.args ?? [];

  return {
    async generate(packageName: string, workspacePath: string): Promise<StubTree> {
      const outDir = path.join(workspacePath, DEFAULT_GENERATOR_OUT_DIRNAME);
      ensureDirectory(outDir);

      await runGeneratorProcess({
        command: options.command,
        args: buildStubgenArgs({ extraArgs, packageName, outDir }),
        cwd: workspacePath,
        env: options.env ?? process.env,
        packageName,
      });

      return readStubTree(outDir);
    },
  };
}
