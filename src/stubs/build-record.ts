import * as fs from "node:fs";

import { removeEntry, writeJsonFileAtomic } from "../shared/fs-utils.js";
import { getModuleBuildRecordPath, type ProjectPaths } from "../shared/paths.js";

/**
 * Marker for the last successful generation of a module.
 */
export interface BuildRecord {
  moduleName: string;
  /** Version string the generated tree was produced for. */
  version: string;
  packageName: string;
  builtAt: string;
}

interface BuildRecordFileV1 {
  version: 1;
  "module-name": string;
  "module-version": string;
  "package-name": string;
  "built-at": string;
}

export interface BuildRecordStore {
  get(moduleName: string): BuildRecord | null;
  set(record: BuildRecord): void;
  delete(moduleName: string): void;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBuildRecordFile(v: unknown, moduleName: string): BuildRecord | null {
  if (!isRecordObject(v)) return null;

  if (v.version !== 1) return null;
  if (v["module-name"] !== moduleName) return null;
  if (typeof v["module-version"] !== "string" || typeof v["package-name"] !== "string") return null;

  return {
    moduleName,
    version: v["module-version"],
    packageName: v["package-name"],
    builtAt: typeof v["built-at"] === "string" ? v["built-at"] : new Date(0).toISOString(),
  };
}

/**
 * Records kept as `.state/<module>/build.json` under the project output root.
 * An unreadable or foreign record reads as absent, which forces regeneration.
 */
export class FileBuildRecordStore implements BuildRecordStore {
  constructor(private readonly paths: ProjectPaths) {}

  get(moduleName: string): BuildRecord | null {
    const recordPath = getModuleBuildRecordPath(this.paths, moduleName);
    if (!fs.existsSync(recordPath)) {
      return null;
    }

    try {
      return parseBuildRecordFile(JSON.parse(fs.readFileSync(recordPath, "utf8")), moduleName);
    } catch {
      return null;
    }
  }

  set(record: BuildRecord): void {
    const value: BuildRecordFileV1 = {
      version: 1,
      "module-name": record.moduleName,
      "module-version": record.version,
      "package-name": record.packageName,
      "built-at": record.builtAt,
    };
    writeJsonFileAtomic(getModuleBuildRecordPath(this.paths, record.moduleName), value);
  }

  delete(moduleName: string): void {
    removeEntry(getModuleBuildRecordPath(this.paths, moduleName));
  }
}

export class MemoryBuildRecordStore implements BuildRecordStore {
  private readonly records = new Map<string, BuildRecord>();

  constructor(initial: Iterable<BuildRecord> = []) {
    for (const record of initial) {
      this.records.set(record.moduleName, { ...record });
    }
  }

  get(moduleName: string): BuildRecord | null {
    const record = this.records.get(moduleName);
    return record ? { ...record } : null;
  }

  set(record: BuildRecord): void {
    this.records.set(record.moduleName, { ...record });
  }

  delete(moduleName: string): void {
    this.records.delete(moduleName);
  }

  moduleNames(): string[] {
    return [...this.records.keys()];
  }
}
