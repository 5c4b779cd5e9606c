import * as fs from "node:fs";
import * as path from "node:path";

import { ensureDirectory, sortedDirectoryEntries } from "../shared/fs-utils.js";

/**
 * Relative POSIX path -> declaration text. A Map cannot hold two entries for the
 * same path, so the one-entry-per-path rule holds by construction.
 */
export type StubTree = ReadonlyMap<string, string>;

export const EMPTY_STUB_TREE: StubTree = new Map<string, string>();

export function normalizeStubPath(relativePath: string): string {
  const posix = relativePath.split(path.sep).join("/").replace(/\\/g, "/");
  const normalized = path.posix.normalize(posix).replace(/^(\.\/)+/, "");

  if (
    !normalized ||
    normalized === "." ||
    normalized.startsWith("/") ||
    normalized === ".." ||
    normalized.startsWith("../")
  ) {
    throw new Error(`Invalid stub path: ${relativePath}`);
  }
  return normalized.replace(/\/+$/, "");
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Build a tree from entries, sorted by path. A repeated path keeps its last content.
 */
export function createStubTree(entries: Iterable<readonly [string, string]>): StubTree {
  const byPath = new Map<string, string>();
  for (const [relativePath, content] of entries) {
    byPath.set(normalizeStubPath(relativePath), content);
  }
  return sortStubTree(byPath);
}

export function sortStubTree(tree: StubTree): StubTree {
  return new Map([...tree.entries()].sort(([a], [b]) => comparePaths(a, b)));
}

export function stubTreesEqual(a: StubTree, b: StubTree): boolean {
  if (a.size !== b.size) return false;
  for (const [p, content] of a) {
    if (b.get(p) !== content) return false;
  }
  return true;
}

function collectFiles(rootDir: string, currentDir: string, into: Array<[string, string]>): void {
  for (const entry of sortedDirectoryEntries(currentDir)) {
    const fullPath = path.join(currentDir, entry.name);
    const stat = fs.statSync(fullPath);

    if (stat.isDirectory()) {
      collectFiles(rootDir, fullPath, into);
      continue;
    }
    if (!stat.isFile()) continue;

    into.push([path.relative(rootDir, fullPath), fs.readFileSync(fullPath, "utf8")]);
  }
}

/**
 * Read every regular file below `dirPath` into a tree. A missing directory reads as empty.
 */
export function readStubTree(dirPath: string): StubTree {
  if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
    return EMPTY_STUB_TREE;
  }

  const files: Array<[string, string]> = [];
  collectFiles(dirPath, dirPath, files);
  return createStubTree(files);
}

export function writeStubTree(dirPath: string, tree: StubTree): void {
  ensureDirectory(dirPath);
  for (const [relativePath, content] of tree) {
    const target = path.join(dirPath, ...normalizeStubPath(relativePath).split("/"));
    ensureDirectory(path.dirname(target));
    fs.writeFileSync(target, content, "utf8");
  }
}
