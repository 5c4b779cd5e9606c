import { AUTO_VERSION } from "../shared/defaults.js";
import { ConfigError } from "../shared/errors.js";
import { MODULE_NAME_ERROR_MESSAGE, isValidModuleName } from "../shared/validation.js";
import type { DependencyManifest } from "../manifest/requirements.js";

export type VersionPolicy = { kind: "explicit"; value: string } | { kind: "auto" };

export interface ModuleSpec {
  readonly moduleName: string;
  readonly packageName: string;
  readonly versionPolicy: VersionPolicy;
  readonly enabled: boolean;
}

export interface ResolverConfig {
  discoverModules: boolean;
  /** Module name -> raw section from the config file (object, version string, or null). */
  modules: Readonly<Record<string, unknown>>;
}

const MODULE_OPTION_KEYS = new Set(["version", "package-name", "skip"]);

interface ModuleSection {
  versionPolicy: VersionPolicy;
  packageName?: string;
  skip: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseVersionPolicy(raw: unknown, moduleName: string): VersionPolicy {
  if (raw === undefined) return { kind: "auto" };
  if (typeof raw !== "string" || !raw.trim()) {
    throw new ConfigError(`Invalid config (modules.${moduleName}.version must be a non-empty string or "auto")`);
  }
  const trimmed = raw.trim();
  return trimmed === AUTO_VERSION ? { kind: "auto" } : { kind: "explicit", value: trimmed };
}

function parseModuleSection(moduleName: string, raw: unknown): ModuleSection {
  if (raw === null || raw === undefined) {
    return { versionPolicy: { kind: "auto" }, skip: false };
  }

  // `"toml": "0.10.0"` is shorthand for `"toml": { "version": "0.10.0" }`.
  if (typeof raw === "string") {
    return { versionPolicy: parseVersionPolicy(raw, moduleName), skip: false };
  }

  if (!isPlainObject(raw)) {
    throw new ConfigError(`Invalid config (modules.${moduleName} must be an object or a version string)`);
  }

  for (const key of Object.keys(raw)) {
    if (!MODULE_OPTION_KEYS.has(key)) {
      throw new ConfigError(`Invalid config (modules.${moduleName} has unsupported option '${key}')`);
    }
  }

  const packageNameRaw = raw["package-name"];
  if (packageNameRaw !== undefined && (typeof packageNameRaw !== "string" || !packageNameRaw.trim())) {
    throw new ConfigError(`Invalid config (modules.${moduleName}.package-name must be a non-empty string)`);
  }

  const skipRaw = raw.skip;
  if (skipRaw !== undefined && typeof skipRaw !== "boolean") {
    throw new ConfigError(`Invalid config (modules.${moduleName}.skip must be boolean)`);
  }

  return {
    versionPolicy: parseVersionPolicy(raw.version, moduleName),
    packageName: typeof packageNameRaw === "string" ? packageNameRaw.trim() : undefined,
    skip: skipRaw === true,
  };
}

function toModuleSpec(moduleName: string, section: ModuleSection): ModuleSpec {
  return Object.freeze({
    moduleName,
    packageName: section.packageName ?? moduleName,
    versionPolicy: section.versionPolicy,
    enabled: !section.skip,
  });
}

/**
 * Build the ordered list of modules for a run: configured modules first (config order),
 * then, with discovery on, every remaining manifest entry (manifest order).
 */
export function resolveModuleSpecs(config: ResolverConfig, manifest: DependencyManifest): ModuleSpec[] {
  const configured = Object.entries(config.modules);

  if (!config.discoverModules && configured.length === 0) {
    throw new ConfigError(
      "Nothing to build: discover-modules is off and no modules are configured"
    );
  }

  const specs: ModuleSpec[] = [];
  const seen = new Set<string>();

  for (const [moduleName, raw] of configured) {
    if (!isValidModuleName(moduleName)) {
      throw new ConfigError(`Invalid config (modules.${moduleName}): ${MODULE_NAME_ERROR_MESSAGE}`);
    }
    specs.push(toModuleSpec(moduleName, parseModuleSection(moduleName, raw)));
    seen.add(moduleName);
  }

  if (config.discoverModules) {
    for (const moduleName of manifest.keys()) {
      if (seen.has(moduleName)) continue;
      specs.push(toModuleSpec(moduleName, { versionPolicy: { kind: "auto" }, skip: false }));
      seen.add(moduleName);
    }
  }

  return specs;
}

export function findModuleSpec(specs: readonly ModuleSpec[], moduleName: string): ModuleSpec | undefined {
  return specs.find((spec) => spec.moduleName === moduleName);
}
