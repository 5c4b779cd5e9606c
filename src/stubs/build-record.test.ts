import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { getModuleBuildRecordPath, getProjectPaths } from "../shared/paths.js";
import { FileBuildRecordStore, MemoryBuildRecordStore, type BuildRecord } from "./build-record.js";

const RECORD: BuildRecord = {
  moduleName: "toml",
  version: "0.10.0",
  packageName: "toml",
  builtAt: "2026-01-01T00:00:00.000Z",
};

function withTempStore(run: (store: FileBuildRecordStore, rootDir: string) => void): void {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "stublayer-record-test-"));
  try {
    run(new FileBuildRecordStore(getProjectPaths(rootDir)), rootDir);
  } finally {
    fs.rmSync(rootDir, { recursive: true, force: true });
  }
}

test("file store writes, reads and deletes records", () => {
  withTempStore((store, rootDir) => {
    assert.equal(store.get("toml"), null);

    store.set(RECORD);
    assert.deepEqual(store.get("toml"), RECORD);

    const written: unknown = JSON.parse(
      fs.readFileSync(getModuleBuildRecordPath(getProjectPaths(rootDir), "toml"), "utf8")
    );
    assert.deepEqual(written, {
      version: 1,
      "module-name": "toml",
      "module-version": "0.10.0",
      "package-name": "toml",
      "built-at": "2026-01-01T00:00:00.000Z",
    });

    store.delete("toml");
    assert.equal(store.get("toml"), null);
  });
});

test("file store treats unreadable records as absent", () => {
  withTempStore((store, rootDir) => {
    const recordPath = getModuleBuildRecordPath(getProjectPaths(rootDir), "toml");
    fs.mkdirSync(path.dirname(recordPath), { recursive: true });

    fs.writeFileSync(recordPath, "{not json", "utf8");
    assert.equal(store.get("toml"), null);

    fs.writeFileSync(recordPath, JSON.stringify({ version: 1, "module-name": "yaml", "module-version": "1", "package-name": "yaml" }), "utf8");
    assert.equal(store.get("toml"), null);
  });
});

test("memory store returns copies", () => {
  const store = new MemoryBuildRecordStore([RECORD]);
  const got = store.get("toml");
  assert.deepEqual(got, RECORD);
  assert.notEqual(got, store.get("toml"));
  assert.deepEqual(store.moduleNames(), ["toml"]);
});
