import assert from "node:assert/strict";
import test from "node:test";
import { ConfigError } from "../shared/errors.js";
import { parseHostVersion, resolveHostVersion } from "./host-version.js";

test("parses minor and patch versions", () => {
  assert.deepEqual(parseHostVersion("3.11"), { major: "3", minor: "3.11" });
  assert.deepEqual(parseHostVersion(" 3.12.1 "), { major: "3", minor: "3.12" });
  assert.equal(parseHostVersion("3"), null);
  assert.equal(parseHostVersion("python3.11"), null);
});

test("a configured version skips the interpreter probe", async () => {
  const version = await resolveHostVersion({ pythonVersion: "3.10", python: "/nonexistent/python" });
  assert.deepEqual(version, { major: "3", minor: "3.10" });
});

test("an invalid configured version is a config error", async () => {
  await assert.rejects(resolveHostVersion({ pythonVersion: "latest", python: "python3" }), ConfigError);
});

test("a missing interpreter is a config error", async () => {
  await assert.rejects(resolveHostVersion({ pythonVersion: null, python: "/nonexistent/python" }), ConfigError);
});
