import type { DependencyManifest } from "../manifest/requirements.js";
import type { BuildRecord } from "./build-record.js";
import type { ModuleSpec } from "./module-spec.js";

export type VersionSource = "explicit" | "manifest" | "unknown";

export interface ResolvedVersion {
  moduleName: string;
  /** Empty when `source` is "unknown". */
  value: string;
  source: VersionSource;
}

export type StalenessReason = "no-build-record" | "version-changed" | "unknown-version";

export function resolveVersion(spec: ModuleSpec, manifest: DependencyManifest): ResolvedVersion {
  if (spec.versionPolicy.kind === "explicit") {
    return { moduleName: spec.moduleName, value: spec.versionPolicy.value, source: "explicit" };
  }

  const fromManifest = manifest.get(spec.moduleName);
  if (fromManifest === undefined) {
    return { moduleName: spec.moduleName, value: "", source: "unknown" };
  }
  return { moduleName: spec.moduleName, value: fromManifest, source: "manifest" };
}

/**
 * Why the generated layer must be rebuilt, or null when the recorded build is current.
 * An unknown version never counts as current.
 */
export function describeStaleness(resolved: ResolvedVersion, record: BuildRecord | null): StalenessReason | null {
  if (resolved.source === "unknown") return "unknown-version";
  if (record === null) return "no-build-record";
  if (record.version !== resolved.value) return "version-changed";
  return null;
}

export function isStale(resolved: ResolvedVersion, record: BuildRecord | null): boolean {
  return describeStaleness(resolved, record) !== null;
}
