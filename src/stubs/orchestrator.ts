import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { GenerationError, UnknownModuleError } from "../shared/errors.js";
import {
  ensureDirectory,
  listTopLevelEntries,
  removeEntry,
  swapDirectoryIntoPlace,
} from "../shared/fs-utils.js";
import { errorMessage, logEvent } from "../shared/log.js";
import {
  getModuleGeneratedDir,
  getModuleLocalOverlayDir,
  getModuleOutputDir,
  getModuleStateDir,
  type ProjectPaths,
} from "../shared/paths.js";
import type { DependencyManifest } from "../manifest/requirements.js";
import type { BuildRecordStore } from "./build-record.js";
import type { StubGenerator } from "./generator.js";
import { countOverrides, mergeLayers } from "./merge.js";
import { findModuleSpec, type ModuleSpec } from "./module-spec.js";
import { readProjectLocalLayer, readUserGlobalLayer, type HostVersion } from "./overlay-sources.js";
import { readStubTree, writeStubTree, type StubTree } from "./stub-tree.js";
import { describeStaleness, resolveVersion, type ResolvedVersion, type StalenessReason } from "./version-oracle.js";

export type ModuleState =
  | "pending"
  | "skipped"
  | "fresh"
  | "regenerating"
  | "generated"
  | "generation-failed"
  | "merged"
  | "written"
  | "cleaned";

export type ModuleStatus = "skipped" | "fresh" | "generated" | "failed";

export type RegenerationReason = StalenessReason | "generated-cache-missing";

export interface ModuleOutcome {
  moduleName: string;
  packageName: string;
  status: ModuleStatus;
  /** Every state the module passed through, in order. */
  states: ModuleState[];
  resolved: ResolvedVersion | null;
  reason: RegenerationReason | null;
  outputFiles: number;
  error?: string;
  diagnostics?: string;
}

export interface BuildSummary {
  outcomes: ModuleOutcome[];
  failed: number;
  ok: boolean;
}

export interface BuildContext {
  specs: readonly ModuleSpec[];
  manifest: DependencyManifest;
  paths: ProjectPaths;
  userOverlaysDir: string;
  hostVersion: HostVersion;
  records: BuildRecordStore;
  generator: StubGenerator;
  now?: () => Date;
}

export interface TargetOptions {
  /** Restrict the run to one module. */
  only?: string;
}

export function selectTargets(specs: readonly ModuleSpec[], only: string | undefined): readonly ModuleSpec[] {
  if (only === undefined) return specs;
  const match = findModuleSpec(specs, only);
  if (!match) {
    throw new UnknownModuleError(only);
  }
  return [match];
}

function writeTreeReplacing(destDir: string, tree: StubTree): void {
  const parentDir = path.dirname(destDir);
  ensureDirectory(parentDir);
  const stagingDir = path.join(parentDir, `.${path.basename(destDir)}.staging-${process.pid}-${Date.now()}`);

  try {
    writeStubTree(stagingDir, tree);
    swapDirectoryIntoPlace(stagingDir, destDir);
  } finally {
    removeEntry(stagingDir);
  }
}

async function generateIntoCache(
  ctx: BuildContext,
  spec: ModuleSpec,
  resolved: ResolvedVersion
): Promise<StubTree> {
  const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "stublayer-gen-"));
  logEvent("info", "module-regenerating", {
    "module-name": spec.moduleName,
    package: spec.packageName,
    workspace,
  });

  try {
    const tree = await ctx.generator.generate(spec.packageName, workspace);
    writeTreeReplacing(getModuleGeneratedDir(ctx.paths, spec.moduleName), tree);
    ctx.records.set({
      moduleName: spec.moduleName,
      version: resolved.value,
      packageName: spec.packageName,
      builtAt: (ctx.now ?? (() => new Date()))().toISOString(),
    });
    return tree;
  } finally {
    removeEntry(workspace);
  }
}

async function buildModule(ctx: BuildContext, spec: ModuleSpec): Promise<ModuleOutcome> {
  const outcome: ModuleOutcome = {
    moduleName: spec.moduleName,
    packageName: spec.packageName,
    status: "failed",
    states: ["pending"],
    resolved: null,
    reason: null,
    outputFiles: 0,
  };

  if (!spec.enabled) {
    outcome.states.push("skipped");
    outcome.status = "skipped";
    logEvent("info", "module-skipped", { "module-name": spec.moduleName });
    return outcome;
  }

  const resolved = resolveVersion(spec, ctx.manifest);
  outcome.resolved = resolved;

  const generatedDir = getModuleGeneratedDir(ctx.paths, spec.moduleName);
  let reason: RegenerationReason | null = describeStaleness(resolved, ctx.records.get(spec.moduleName));
  if (reason === null && !fs.existsSync(generatedDir)) {
    reason = "generated-cache-missing";
  }
  outcome.reason = reason;

  // Set only after a regeneration; a fresh module reads its cached tree below.
  let regenerated: StubTree | null = null;
  if (reason === null) {
    outcome.states.push("fresh");
    logEvent("info", "module-fresh", { "module-name": spec.moduleName, version: resolved.value });
  } else {
    outcome.states.push("regenerating");
    try {
      regenerated = await generateIntoCache(ctx, spec, resolved);
    } catch (err) {
      outcome.states.push("generation-failed");
      outcome.error = errorMessage(err);
      if (err instanceof GenerationError && err.diagnostics) {
        outcome.diagnostics = err.diagnostics;
      }
      logEvent("error", "module-generation-failed", {
        "module-name": spec.moduleName,
        version: resolved.value || null,
        reason,
        error: outcome.error,
      });
      return outcome;
    }
    outcome.states.push("generated");
    logEvent("info", "module-generated", {
      "module-name": spec.moduleName,
      version: resolved.value || null,
      reason,
      files: regenerated.size,
    });
  }

  try {
    const generated = regenerated ?? readStubTree(generatedDir);
    const userGlobal = readUserGlobalLayer({
      overlaysDir: ctx.userOverlaysDir,
      hostVersion: ctx.hostVersion,
      moduleName: spec.moduleName,
    });
    const localDir = getModuleLocalOverlayDir(ctx.paths, spec.moduleName);
    const projectLocal = readProjectLocalLayer({ localDir: ctx.paths.localDir, moduleName: spec.moduleName });

    const output = mergeLayers(generated, userGlobal.tree, projectLocal);
    outcome.states.push("merged");
    logEvent("info", "module-merged", {
      "module-name": spec.moduleName,
      files: output.size,
      "user-global-version": userGlobal.versionDir,
      "user-global-dir": userGlobal.sourceDir,
      "project-local-dir": localDir,
      "layer-sources": countOverrides([
        { layer: "generated", tree: generated },
        { layer: "user-global", tree: userGlobal.tree },
        { layer: "project-local", tree: projectLocal },
      ]),
    });

    writeTreeReplacing(getModuleOutputDir(ctx.paths, spec.moduleName), output);
    outcome.states.push("written");
    outcome.outputFiles = output.size;
  } catch (err) {
    outcome.error = errorMessage(err);
    logEvent("error", "module-write-failed", { "module-name": spec.moduleName, error: outcome.error });
    return outcome;
  }

  outcome.status = reason === null ? "fresh" : "generated";
  logEvent("info", "module-written", { "module-name": spec.moduleName, files: outcome.outputFiles });
  return outcome;
}

/**
 * Process modules one at a time, in resolver order. A failure in one module is
 * recorded in its outcome and the run moves on.
 */
export async function runBuild(ctx: BuildContext, options: TargetOptions = {}): Promise<BuildSummary> {
  const targets = selectTargets(ctx.specs, options.only);
  const startedAt = Date.now();
  const outcomes: ModuleOutcome[] = [];

  for (const spec of targets) {
    outcomes.push(await buildModule(ctx, spec));
  }

  const failed = outcomes.filter((o) => o.status === "failed").length;
  logEvent(failed > 0 ? "warn" : "info", "run-complete", {
    modules: outcomes.length,
    generated: outcomes.filter((o) => o.status === "generated").length,
    fresh: outcomes.filter((o) => o.status === "fresh").length,
    skipped: outcomes.filter((o) => o.status === "skipped").length,
    failed,
    "duration-ms": Date.now() - startedAt,
  });

  return { outcomes, failed, ok: failed === 0 };
}

// ==================== Clean ====================

export interface CleanContext {
  specs: readonly ModuleSpec[];
  paths: ProjectPaths;
  records: BuildRecordStore;
}

export interface CleanSummary {
  cleaned: string[];
  /** Output or state entries of modules no longer configured. */
  orphans: string[];
  failed: Array<{ moduleName: string; error: string }>;
  ok: boolean;
}

function cleanModule(ctx: CleanContext, moduleName: string): void {
  removeEntry(getModuleOutputDir(ctx.paths, moduleName));
  ctx.records.delete(moduleName);
  removeEntry(getModuleStateDir(ctx.paths, moduleName));
}

/**
 * Remove output, cached generator output and build records. Project-local overlays
 * are never touched.
 */
export function runClean(ctx: CleanContext, options: TargetOptions = {}): CleanSummary {
  const targets = selectTargets(ctx.specs, options.only);
  const summary: CleanSummary = { cleaned: [], orphans: [], failed: [], ok: true };

  for (const spec of targets) {
    try {
      cleanModule(ctx, spec.moduleName);
      summary.cleaned.push(spec.moduleName);
      logEvent("info", "module-cleaned", { "module-name": spec.moduleName });
    } catch (err) {
      const message = errorMessage(err);
      summary.failed.push({ moduleName: spec.moduleName, error: message });
      logEvent("error", "module-clean-failed", { "module-name": spec.moduleName, error: message });
    }
  }

  if (options.only === undefined) {
    const known = new Set(ctx.specs.map((spec) => spec.moduleName));
    const orphanNames = new Set<string>();
    const recordFailure = (name: string, entryPath: string, err: unknown): void => {
      const message = errorMessage(err);
      summary.failed.push({ moduleName: name, error: message });
      logEvent("error", "orphan-clean-failed", { path: entryPath, error: message });
    };

    for (const dir of [ctx.paths.outDir, ctx.paths.stateDir]) {
      let entries: Array<{ name: string; absolutePath: string }>;
      try {
        entries = listTopLevelEntries(dir);
      } catch (err) {
        recordFailure(path.basename(dir), dir, err);
        continue;
      }

      for (const entry of entries) {
        if (known.has(entry.name)) continue;
        try {
          removeEntry(entry.absolutePath);
          orphanNames.add(entry.name);
        } catch (err) {
          recordFailure(entry.name, entry.absolutePath, err);
        }
      }
    }
    summary.orphans = [...orphanNames].sort();
    for (const name of summary.orphans) {
      logEvent("info", "orphan-cleaned", { name });
    }
  }

  summary.ok = summary.failed.length === 0;
  return summary;
}

// ==================== Inspect ====================

export interface ModuleInspection {
  moduleName: string;
  packageName: string;
  enabled: boolean;
  resolved: ResolvedVersion;
  builtVersion: string | null;
  reason: RegenerationReason | null;
}

export function inspectModules(
  ctx: Pick<BuildContext, "specs" | "manifest" | "paths" | "records">,
  options: TargetOptions = {}
): ModuleInspection[] {
  return selectTargets(ctx.specs, options.only).map((spec) => {
    const resolved = resolveVersion(spec, ctx.manifest);
    const record = ctx.records.get(spec.moduleName);
    let reason: RegenerationReason | null = describeStaleness(resolved, record);
    if (reason === null && !fs.existsSync(getModuleGeneratedDir(ctx.paths, spec.moduleName))) {
      reason = "generated-cache-missing";
    }
    return {
      moduleName: spec.moduleName,
      packageName: spec.packageName,
      enabled: spec.enabled,
      resolved,
      builtVersion: record?.version ?? null,
      reason,
    };
  });
}
