import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { GenerationError } from "../../shared/errors.js";
import { setDebugEnabled, setLogWriter } from "../../shared/log.js";
import type { StubGenerator } from "../../stubs/generator.js";
import { createStubTree, readStubTree, type StubTree } from "../../stubs/stub-tree.js";
import type { CommandIo } from "../output.js";
import { runBuildCommand } from "./build.js";
import { runStatusCommand } from "./status.js";

interface CapturedIo extends CommandIo {
  stdout: string[];
  stderr: string[];
}

function captureIo(): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

function stubGenerator(trees: Record<string, StubTree>): StubGenerator & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async generate(packageName: string): Promise<StubTree> {
      calls.push(packageName);
      const tree = trees[packageName];
      if (!tree) throw new GenerationError("stubgen exited with code 1", packageName, `No module named '${packageName}'`);
      return tree;
    },
  };
}

async function withProject(
  files: Record<string, string>,
  run: (params: { dir: string; env: NodeJS.ProcessEnv }) => Promise<void>
): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stublayer-command-test-"));
  for (const [rel, content] of Object.entries(files)) {
    fs.mkdirSync(path.dirname(path.join(dir, rel)), { recursive: true });
    fs.writeFileSync(path.join(dir, rel), content, "utf8");
  }
  const env: NodeJS.ProcessEnv = { STUBLAYER_HOME: path.join(dir, "home") };

  setLogWriter(() => {});
  try {
    await run({ dir, env });
  } finally {
    setLogWriter(null);
    setDebugEnabled(false);
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

const CONFIG = JSON.stringify({
  "python-version": "3.11",
  modules: { toml: {}, six: { skip: true } },
});

const TOML_TREE = createStubTree([["toml/__init__.pyi", "def loads(s: str) -> dict: ...\n"]]);

test("build generates, merges and prints a summary", async () => {
  await withProject(
    {
      ".stublayer.json": CONFIG,
      "requirements.txt": "toml==0.10.2\nsix==1.16.0\n",
      "home/overlays/3.11/toml/toml/extra.pyi": "X: int\n",
    },
    async ({ dir, env }) => {
      const io = captureIo();
      const generator = stubGenerator({ toml: TOML_TREE });

      const code = await runBuildCommand({ cwd: dir, env, io, generator });

      assert.equal(code, 0);
      assert.deepEqual(generator.calls, ["toml"]);
      assert.deepEqual(io.stderr, []);
      assert.equal(
        io.stdout.join("\n"),
        [
          "module: toml",
          "status: generated",
          "version: 0.10.2",
          "regenerated: no-build-record",
          "files: 2",
          "",
          "module: six",
          "status: skipped",
          "",
          "summary: generated=1 fresh=0 skipped=1 failed=0",
        ].join("\n")
      );
      assert.deepEqual(
        [...readStubTree(path.join(dir, ".stublayer", "out", "toml")).keys()],
        ["toml/__init__.pyi", "toml/extra.pyi"]
      );
    }
  );
});

test("a second build is fresh and does not call the generator", async () => {
  await withProject({ ".stublayer.json": CONFIG, "requirements.txt": "toml==0.10.2\n" }, async ({ dir, env }) => {
    const generator = stubGenerator({ toml: TOML_TREE });
    assert.equal(await runBuildCommand({ cwd: dir, env, io: captureIo(), generator }), 0);

    const io = captureIo();
    assert.equal(await runBuildCommand({ cwd: dir, env, io, generator, module: "toml" }), 0);
    assert.deepEqual(generator.calls, ["toml"]);
    assert.equal(
      io.stdout.join("\n"),
      ["module: toml", "status: fresh", "version: 0.10.2", "files: 1", "", "summary: generated=0 fresh=1 skipped=0 failed=0"].join(
        "\n"
      )
    );
  });
});

test("build reports generation failures with diagnostics and exits 1", async () => {
  await withProject({ ".stublayer.json": CONFIG, "requirements.txt": "toml==0.10.2\n" }, async ({ dir, env }) => {
    const io = captureIo();
    const code = await runBuildCommand({ cwd: dir, env, io, generator: stubGenerator({}) });

    assert.equal(code, 1);
    assert.equal(
      io.stdout[0]?.split("\n\n")[0],
      [
        "module: toml",
        "status: failed",
        "version: 0.10.2",
        "regenerated: no-build-record",
        "error: stubgen exited with code 1",
        "diagnostics:",
        "  No module named 'toml'",
      ].join("\n")
    );
    assert.equal(fs.existsSync(path.join(dir, ".stublayer", "out", "toml")), false);
  });
});

test("build rejects an unknown module before touching anything", async () => {
  await withProject({ ".stublayer.json": CONFIG }, async ({ dir, env }) => {
    const io = captureIo();
    const generator = stubGenerator({ toml: TOML_TREE });

    const code = await runBuildCommand({ cwd: dir, env, io, generator, module: "yaml" });

    assert.equal(code, 1);
    assert.deepEqual(io.stderr, ["error: Unknown module: yaml"]);
    assert.deepEqual(generator.calls, []);
    assert.equal(fs.existsSync(path.join(dir, ".stublayer", "out")), false);
  });
});

test("build reports a missing config file", async () => {
  await withProject({}, async ({ dir, env }) => {
    const io = captureIo();
    const code = await runBuildCommand({ cwd: dir, env, io, generator: stubGenerator({}) });

    assert.equal(code, 1);
    assert.equal(io.stderr.length, 1);
    assert.ok(io.stderr[0]?.startsWith(`error: Failed to read config file ${path.join(dir, ".stublayer.json")}`));
  });
});

test("build --clean removes output and records but keeps project-local overlays", async () => {
  await withProject(
    {
      ".stublayer.json": CONFIG,
      "requirements.txt": "toml==0.10.2\n",
      ".stublayer/.local/toml/toml/local.pyi": "Y: str\n",
    },
    async ({ dir, env }) => {
      assert.equal(await runBuildCommand({ cwd: dir, env, io: captureIo(), generator: stubGenerator({ toml: TOML_TREE }) }), 0);
      assert.equal(fs.existsSync(path.join(dir, ".stublayer", "out", "toml", "toml", "local.pyi")), true);

      const io = captureIo();
      const code = await runBuildCommand({ cwd: dir, env, io, clean: true });

      assert.equal(code, 0);
      assert.deepEqual(io.stdout, ["cleaned: toml, six"]);
      assert.equal(fs.existsSync(path.join(dir, ".stublayer", "out", "toml")), false);
      assert.equal(fs.existsSync(path.join(dir, ".stublayer", ".state", "toml")), false);
      assert.equal(fs.existsSync(path.join(dir, ".stublayer", ".local", "toml", "toml", "local.pyi")), true);
    }
  );
});

test("status shows versions and staleness without building", async () => {
  await withProject({ ".stublayer.json": CONFIG, "requirements.txt": "toml==0.10.2\n" }, async ({ dir, env }) => {
    const io = captureIo();
    const code = runStatusCommand({ cwd: dir, env, io, module: "toml" });

    assert.equal(code, 0);
    assert.deepEqual(io.stdout, [
      [
        "module: toml",
        "package: toml",
        "enabled: true",
        "version: 0.10.2 (manifest)",
        "built-version: (none)",
        "stale: true (no-build-record)",
      ].join("\n"),
    ]);
    assert.equal(fs.existsSync(path.join(dir, ".stublayer", "out")), false);
  });
});

test("status reports when discovery finds nothing", async () => {
  await withProject({ ".stublayer.json": JSON.stringify({ "discover-modules": true }) }, async ({ dir, env }) => {
    const io = captureIo();
    assert.equal(runStatusCommand({ cwd: dir, env, io }), 0);
    assert.deepEqual(io.stdout, ["no-modules: true"]);
  });
});
