import * as fs from "node:fs";
import * as path from "node:path";

import { logEvent } from "../shared/log.js";

/**
 * Declared dependencies in declaration order: module name -> pinned or constrained version.
 */
export type DependencyManifest = ReadonlyMap<string, string>;

const REQUIREMENT_SPEC = /^(?<name>[A-Za-z0-9_][A-Za-z0-9_.-]*)\s*(?:\[[^\]]*\])?\s*[=<>~!]+\s*(?<version>\S.*)$/;

export function parseRequirementLine(line: string): [string, string] | null {
  let text = line.trim();
  if (!text || text.startsWith("#") || text.startsWith("-")) return null;

  text = text.replace(/\s+#.*$/, "");
  const markerIndex = text.indexOf(";");
  if (markerIndex !== -1) {
    text = text.slice(0, markerIndex);
  }
  text = text.trim();

  const match = REQUIREMENT_SPEC.exec(text);
  const name = match?.groups?.name;
  const version = match?.groups?.version?.trim();
  if (!name || !version) return null;
  return [name, version];
}

export function parseRequirements(text: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of text.split(/\r?\n/)) {
    const entry = parseRequirementLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

/**
 * Combine requirement entries into a manifest. A repeated name keeps its first
 * position and takes the later version.
 */
export function buildManifest(entries: Iterable<readonly [string, string]>): DependencyManifest {
  const manifest = new Map<string, string>();
  for (const [name, version] of entries) {
    manifest.set(name, version);
  }
  return manifest;
}

export interface LoadedManifest {
  manifest: DependencyManifest;
  missingPaths: string[];
}

export function loadManifest(params: { requirementsPaths: readonly string[]; cwd: string }): LoadedManifest {
  const entries: Array<[string, string]> = [];
  const missingPaths: string[] = [];

  for (const rel of params.requirementsPaths) {
    const filePath = path.resolve(params.cwd, rel);
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf8");
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
      missingPaths.push(filePath);
      logEvent("warn", "manifest-file-missing", { path: filePath });
      continue;
    }
    entries.push(...parseRequirements(text));
  }

  return { manifest: buildManifest(entries), missingPaths };
}
