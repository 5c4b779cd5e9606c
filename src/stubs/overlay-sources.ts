import * as fs from "node:fs";
import * as path from "node:path";

import { readStubTree, EMPTY_STUB_TREE, type StubTree } from "./stub-tree.js";

export interface HostVersion {
  /** "X" */
  major: string;
  /** "X.Y" */
  minor: string;
}

/**
 * Pick the user-global version directory for a module.
 *
 * | minor present | major present | result |
 * |---------------|---------------|--------|
 * | yes           | any           | minor  |
 * | no            | yes           | major  |
 * | no            | no            | null   |
 *
 * The two levels are never combined.
 */
export function chooseUserGlobalVersionDir(
  version: HostVersion,
  available: Iterable<string>
): string | null {
  const present = new Set(available);
  if (present.has(version.minor)) return version.minor;
  if (present.has(version.major)) return version.major;
  return null;
}

export interface UserGlobalLayer {
  tree: StubTree;
  versionDir: string | null;
  sourceDir: string | null;
}

function isDirectory(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

/**
 * `<overlaysDir>/<X.Y or X>/<module>/` is read as-is, rooted like the generator output
 * (`toml/__init__.pyi`, `six.pyi`, `google/protobuf/message.pyi`).
 */
export function readUserGlobalLayer(params: {
  overlaysDir: string;
  hostVersion: HostVersion;
  moduleName: string;
}): UserGlobalLayer {
  const moduleDirFor = (versionDir: string): string => path.join(params.overlaysDir, versionDir, params.moduleName);

  const available = [params.hostVersion.minor, params.hostVersion.major].filter((v) => isDirectory(moduleDirFor(v)));
  const versionDir = chooseUserGlobalVersionDir(params.hostVersion, available);
  if (versionDir === null) {
    return { tree: EMPTY_STUB_TREE, versionDir: null, sourceDir: null };
  }

  const sourceDir = moduleDirFor(versionDir);
  return { tree: readStubTree(sourceDir), versionDir, sourceDir };
}

export function readProjectLocalLayer(params: { localDir: string; moduleName: string }): StubTree {
  return readStubTree(path.join(params.localDir, params.moduleName));
}
