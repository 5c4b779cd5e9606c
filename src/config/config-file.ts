import * as fs from "node:fs";
import * as path from "node:path";

import {
  DEFAULT_DISCOVER_MODULES,
  DEFAULT_GENERATOR_COMMAND,
  DEFAULT_OUTPUT_DIRNAME,
  DEFAULT_PYTHON_EXECUTABLE,
  DEFAULT_REQUIREMENTS_PATHS,
} from "../shared/defaults.js";
import { ConfigError } from "../shared/errors.js";
import { errorMessage } from "../shared/log.js";
import type { ResolverConfig } from "../stubs/module-spec.js";

/**
 * `.stublayer.json`
 *
 * {
 *   "discover-modules": true,
 *   "output-directory": ".stublayer",
 *   "requirements-paths": ["requirements.txt"],
 *   "python": "python3",
 *   "python-version": "3.11",
 *   "generator": { "command": "stubgen", "args": [] },
 *   "modules": { "toml": { "version": "auto", "package-name": "toml" } }
 * }
 */
export interface StublayerConfig extends ResolverConfig {
  /** Relative to the config file's directory unless absolute. */
  outputDirectory: string;
  requirementsPaths: string[];
  python: string;
  pythonVersion: string | null;
  generator: {
    command: string;
    args: string[];
  };
}

const TOP_LEVEL_KEYS = new Set([
  "discover-modules",
  "output-directory",
  "requirements-paths",
  "python",
  "python-version",
  "generator",
  "modules",
]);

const GENERATOR_KEYS = new Set(["command", "args"]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseNonEmptyString(raw: unknown, key: string, fallback: string): string {
  if (raw === undefined) return fallback;
  if (typeof raw !== "string" || !raw.trim()) {
    throw new ConfigError(`Invalid config (${key} must be a non-empty string)`);
  }
  return raw.trim();
}

function parseStringArray(raw: unknown, key: string, fallback: readonly string[]): string[] {
  if (raw === undefined) return [...fallback];
  if (!Array.isArray(raw) || raw.some((item) => typeof item !== "string")) {
    throw new ConfigError(`Invalid config (${key} must be an array of strings)`);
  }
  return raw.map((item: string) => item);
}

function parseGenerator(raw: unknown): StublayerConfig["generator"] {
  if (raw === undefined) {
    return { command: DEFAULT_GENERATOR_COMMAND, args: [] };
  }
  if (!isPlainObject(raw)) {
    throw new ConfigError("Invalid config (generator must be an object)");
  }
  for (const key of Object.keys(raw)) {
    if (!GENERATOR_KEYS.has(key)) {
      throw new ConfigError(`Invalid config (generator has unsupported option '${key}')`);
    }
  }
  return {
    command: parseNonEmptyString(raw.command, "generator.command", DEFAULT_GENERATOR_COMMAND),
    args: parseStringArray(raw.args, "generator.args", []),
  };
}

export function parseConfigFile(json: string): StublayerConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new ConfigError("Invalid config JSON");
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError("Invalid config (expected object)");
  }

  for (const key of Object.keys(parsed)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      throw new ConfigError(`Invalid config (unsupported option '${key}')`);
    }
  }

  let discoverModules: boolean = DEFAULT_DISCOVER_MODULES;
  const discoverRaw = parsed["discover-modules"];
  if (discoverRaw !== undefined) {
    if (typeof discoverRaw !== "boolean") {
      throw new ConfigError("Invalid config (discover-modules must be boolean)");
    }
    discoverModules = discoverRaw;
  }

  let modules: Record<string, unknown> = {};
  const modulesRaw = parsed.modules;
  if (modulesRaw !== undefined) {
    if (!isPlainObject(modulesRaw)) {
      throw new ConfigError("Invalid config (modules must be an object)");
    }
    modules = modulesRaw;
  }

  const pythonVersionRaw = parsed["python-version"];
  if (pythonVersionRaw !== undefined && (typeof pythonVersionRaw !== "string" || !pythonVersionRaw.trim())) {
    throw new ConfigError("Invalid config (python-version must be a non-empty string)");
  }

  return {
    discoverModules,
    modules,
    outputDirectory: parseNonEmptyString(parsed["output-directory"], "output-directory", DEFAULT_OUTPUT_DIRNAME),
    requirementsPaths: parseStringArray(parsed["requirements-paths"], "requirements-paths", DEFAULT_REQUIREMENTS_PATHS),
    python: parseNonEmptyString(parsed.python, "python", DEFAULT_PYTHON_EXECUTABLE),
    pythonVersion: typeof pythonVersionRaw === "string" ? pythonVersionRaw.trim() : null,
    generator: parseGenerator(parsed.generator),
  };
}

export interface LoadedConfig {
  config: StublayerConfig;
  /** Directory relative paths in the config resolve against. */
  baseDir: string;
  outputRoot: string;
}

export function loadConfigFile(filePath: string): LoadedConfig {
  const resolved = path.resolve(filePath);
  let json: string;
  try {
    json = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read config file ${resolved}: ${errorMessage(err)}`);
  }

  const config = parseConfigFile(json);
  const baseDir = path.dirname(resolved);
  return {
    config,
    baseDir,
    outputRoot: path.resolve(baseDir, config.outputDirectory),
  };
}
