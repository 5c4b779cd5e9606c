import { spawn } from "node:child_process";

import { ConfigError } from "../shared/errors.js";
import { errorMessage } from "../shared/log.js";
import type { HostVersion } from "./overlay-sources.js";

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.\d+.*)?$/;

const PROBE_SCRIPT = "import sys; print('%d.%d' % sys.version_info[:2])";

/**
 * "3.11" or "3.11.4" -> { major: "3", minor: "3.11" }
 */
export function parseHostVersion(raw: string): HostVersion | null {
  const match = VERSION_PATTERN.exec(raw.trim());
  if (!match) return null;
  const [, major, minor] = match;
  if (major === undefined || minor === undefined) return null;
  return { major, minor: `${major}.${minor}` };
}

function probeInterpreter(python: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const child = spawn(python, ["-c", PROBE_SCRIPT], { stdio: ["ignore", "pipe", "ignore"] });

    child.stdout.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    child.on("close", (code) => {
      if (code !== 0) {
        reject(new ConfigError(`Could not determine host version: ${python} exited with code ${code ?? "null"}`));
        return;
      }
      resolve(Buffer.concat(chunks).toString("utf-8").trim());
    });
    child.on("error", (err) => {
      reject(new ConfigError(`Could not determine host version: failed to spawn ${python}: ${errorMessage(err)}`));
    });
  });
}

/**
 * A configured version wins; otherwise the interpreter is asked.
 */
export async function resolveHostVersion(params: {
  pythonVersion: string | null;
  python: string;
}): Promise<HostVersion> {
  const raw = params.pythonVersion ?? (await probeInterpreter(params.python));
  const parsed = parseHostVersion(raw);
  if (!parsed) {
    throw new ConfigError(`Invalid host version: ${JSON.stringify(raw)} (expected X.Y)`);
  }
  return parsed;
}
