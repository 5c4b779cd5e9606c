import * as path from "node:path";

import { loadConfigFile, type StublayerConfig } from "../config/config-file.js";
import { loadManifest, type DependencyManifest } from "../manifest/requirements.js";
import { DEFAULT_CONFIG_FILENAME } from "../shared/defaults.js";
import { STUBLAYER_DEBUG_ENV } from "../shared/env.js";
import { setDebugEnabled } from "../shared/log.js";
import { getProjectPaths, getUserPaths, type ProjectPaths, type UserPaths } from "../shared/paths.js";
import { FileBuildRecordStore } from "../stubs/build-record.js";
import { resolveModuleSpecs, type ModuleSpec } from "../stubs/module-spec.js";

export interface RunContextOptions {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  debug?: boolean;
}

export interface RunContext {
  config: StublayerConfig;
  baseDir: string;
  paths: ProjectPaths;
  userPaths: UserPaths;
  manifest: DependencyManifest;
  specs: ModuleSpec[];
  records: FileBuildRecordStore;
}

/**
 * Shared setup for every command: config, manifest, resolved modules. Any failure
 * here aborts the command before a module is touched.
 */
export function loadRunContext(options: RunContextOptions = {}): RunContext {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  setDebugEnabled(Boolean(options.debug) || env[STUBLAYER_DEBUG_ENV] === "1");

  const loaded = loadConfigFile(path.resolve(cwd, options.configFile ?? DEFAULT_CONFIG_FILENAME));
  const userPaths = getUserPaths(env);
  const { manifest } = loadManifest({
    requirementsPaths: loaded.config.requirementsPaths,
    cwd: loaded.baseDir,
  });
  const specs = resolveModuleSpecs(loaded.config, manifest);
  const paths = getProjectPaths(loaded.outputRoot);

  return {
    config: loaded.config,
    baseDir: loaded.baseDir,
    paths,
    userPaths,
    manifest,
    specs,
    records: new FileBuildRecordStore(paths),
  };
}
