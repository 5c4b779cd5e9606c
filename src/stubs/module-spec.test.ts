import assert from "node:assert/strict";
import test from "node:test";
import { buildManifest } from "../manifest/requirements.js";
import { ConfigError } from "../shared/errors.js";
import { findModuleSpec, resolveModuleSpecs } from "./module-spec.js";

const manifest = buildManifest([
  ["toml", "0.10.0"],
  ["pyyaml", "6.0.1"],
]);

test("discovery turns every manifest entry into a module", () => {
  const specs = resolveModuleSpecs({ discoverModules: true, modules: {} }, manifest);

  assert.deepEqual(specs, [
    { moduleName: "toml", packageName: "toml", versionPolicy: { kind: "auto" }, enabled: true },
    { moduleName: "pyyaml", packageName: "pyyaml", versionPolicy: { kind: "auto" }, enabled: true },
  ]);
});

test("configured sections override discovered modules and come first", () => {
  const specs = resolveModuleSpecs(
    {
      discoverModules: true,
      modules: { pyyaml: { "package-name": "yaml", version: "6.0" } },
    },
    manifest
  );

  assert.deepEqual(specs, [
    {
      moduleName: "pyyaml",
      packageName: "yaml",
      versionPolicy: { kind: "explicit", value: "6.0" },
      enabled: true,
    },
    { moduleName: "toml", packageName: "toml", versionPolicy: { kind: "auto" }, enabled: true },
  ]);
});

test("without discovery only configured modules are included", () => {
  const specs = resolveModuleSpecs(
    { discoverModules: false, modules: { docopt: "0.6.2", six: { skip: true }, toml: { version: "auto" } } },
    manifest
  );

  assert.deepEqual(specs, [
    { moduleName: "docopt", packageName: "docopt", versionPolicy: { kind: "explicit", value: "0.6.2" }, enabled: true },
    { moduleName: "six", packageName: "six", versionPolicy: { kind: "auto" }, enabled: false },
    { moduleName: "toml", packageName: "toml", versionPolicy: { kind: "auto" }, enabled: true },
  ]);
});

test("modules outside the manifest are not discovered", () => {
  const specs = resolveModuleSpecs({ discoverModules: true, modules: {} }, buildManifest([["toml", "0.10.0"]]));

  assert.deepEqual(specs.map((s) => s.moduleName), ["toml"]);
  assert.equal(findModuleSpec(specs, "docopt"), undefined);
});

test("an unsupported module option is a config error", () => {
  assert.throws(
    () => resolveModuleSpecs({ discoverModules: true, modules: { toml: { versoin: "1.0" } } }, manifest),
    (err: unknown) =>
      err instanceof ConfigError && err.message === "Invalid config (modules.toml has unsupported option 'versoin')"
  );
});

test("no discovery and no modules is a config error", () => {
  assert.throws(() => resolveModuleSpecs({ discoverModules: false, modules: {} }, manifest), ConfigError);
});

test("malformed module sections are config errors", () => {
  assert.throws(() => resolveModuleSpecs({ discoverModules: false, modules: { toml: 3 } }, manifest), ConfigError);
  assert.throws(
    () => resolveModuleSpecs({ discoverModules: false, modules: { toml: { skip: "yes" } } }, manifest),
    ConfigError
  );
  assert.throws(
    () => resolveModuleSpecs({ discoverModules: false, modules: { "../etc": {} } }, manifest),
    ConfigError
  );
});
