import * as os from "node:os";
import * as path from "node:path";

import { STUBLAYER_HOME_ENV } from "./env.js";
import {
  DEFAULT_BUILD_RECORD_FILENAME,
  DEFAULT_GENERATED_DIRNAME,
  DEFAULT_LOCAL_DIRNAME,
  DEFAULT_LOCK_FILENAME,
  DEFAULT_OUT_DIRNAME,
  DEFAULT_STATE_DIRNAME,
  DEFAULT_USER_OVERLAYS_DIRNAME,
  getDefaultStublayerHome,
} from "./defaults.js";
import { ConfigError } from "./errors.js";

function expandTilde(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/") || p.startsWith("~\\")) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

function resolveHomeDirFromEnv(
  env: NodeJS.ProcessEnv
): { ok: true; dir: string } | { ok: false; error: string } {
  const raw = (env[STUBLAYER_HOME_ENV] ?? "").trim();
  if (!raw) return { ok: true, dir: getDefaultStublayerHome() };

  const expanded = expandTilde(raw);
  if (!path.isAbsolute(expanded)) {
    return { ok: false, error: `Invalid ${STUBLAYER_HOME_ENV} (must be an absolute path or start with ~): ${raw}` };
  }

  return { ok: true, dir: expanded };
}

export interface UserPaths {
  homeDir: string;
  overlaysDir: string;
}

export function getUserPaths(env: NodeJS.ProcessEnv = process.env): UserPaths {
  const resolved = resolveHomeDirFromEnv(env);
  if (!resolved.ok) {
    throw new ConfigError(resolved.error);
  }

  return {
    homeDir: resolved.dir,
    overlaysDir: path.join(resolved.dir, DEFAULT_USER_OVERLAYS_DIRNAME),
  };
}

/**
 * On-disk layout under a project's output root.
 *
 *   out/<module>/...              merged output read by the type checker
 *   .state/<module>/build.json    build record
 *   .state/<module>/generated/... cached generator output
 *   .local/<module>/...           project-local overlay (user-authored)
 */
export interface ProjectPaths {
  rootDir: string;
  outDir: string;
  stateDir: string;
  localDir: string;
  lockPath: string;
}

export function getProjectPaths(rootDir: string): ProjectPaths {
  return {
    rootDir,
    outDir: path.join(rootDir, DEFAULT_OUT_DIRNAME),
    stateDir: path.join(rootDir, DEFAULT_STATE_DIRNAME),
    localDir: path.join(rootDir, DEFAULT_LOCAL_DIRNAME),
    lockPath: path.join(rootDir, DEFAULT_LOCK_FILENAME),
  };
}

export function getModuleOutputDir(paths: ProjectPaths, moduleName: string): string {
  return path.join(paths.outDir, moduleName);
}

export function getModuleStateDir(paths: ProjectPaths, moduleName: string): string {
  return path.join(paths.stateDir, moduleName);
}

export function getModuleBuildRecordPath(paths: ProjectPaths, moduleName: string): string {
  return path.join(getModuleStateDir(paths, moduleName), DEFAULT_BUILD_RECORD_FILENAME);
}

export function getModuleGeneratedDir(paths: ProjectPaths, moduleName: string): string {
  return path.join(getModuleStateDir(paths, moduleName), DEFAULT_GENERATED_DIRNAME);
}

export function getModuleLocalOverlayDir(paths: ProjectPaths, moduleName: string): string {
  return path.join(paths.localDir, moduleName);
}
