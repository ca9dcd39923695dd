/**
 * Unit tests for the benchmark request, artifact handling and the
 * process-backed benchmark runner.
 */

import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import {
  BenchmarkError,
  type BenchmarkRequest,
  type HarnessConfig,
  ProcessBenchmarkRunner,
  SilentStageReporter,
  benchmarkTemplateVars,
  collectResult,
  createBenchmarkRequest,
  prepareArtifactPath,
  quarantineArtifact
} from "../../../util";
import { TEST_SETTINGS, createTestConfig, createWorkspace } from "./fakes";

describe("Benchmark requests", () => {
  const input: BenchmarkRequest = {
    topologyDir: "/topology",
    clientConfigPath: "/topology/nodes/client.toml",
    proxy: { host: "127.0.0.1", port: 9150 },
    reference: { host: "127.0.0.1", port: 9008 },
    artifactPath: "/results/benchmark-test-run.json"
  };

  it("should freeze the request and its endpoints", () => {
    const request = createBenchmarkRequest(input);

    assert.ok(Object.isFrozen(request));
    assert.ok(Object.isFrozen(request.proxy));
    assert.ok(Object.isFrozen(request.reference));
    assert.notStrictEqual(request.proxy, input.proxy);
    assert.deepEqual(request, input);
  });

  it("should expose every endpoint part as a template variable", () => {
    assert.deepEqual(benchmarkTemplateVars(createBenchmarkRequest(input)), {
      topologyDir: "/topology",
      clientConfig: "/topology/nodes/client.toml",
      proxy: "127.0.0.1:9150",
      proxyHost: "127.0.0.1",
      proxyPort: "9150",
      reference: "127.0.0.1:9008",
      referenceHost: "127.0.0.1",
      referencePort: "9008",
      output: "/results/benchmark-test-run.json"
    });
  });
});

describe("Result artifacts", () => {
  let workspace: ReturnType<typeof createWorkspace>;
  let artifactPath: string;

  beforeEach(() => {
    workspace = createWorkspace();
    artifactPath = path.join(workspace.resultsDir, "nested", "benchmark-test-run.json");
  });

  afterEach(() => {
    workspace.cleanup();
  });

  it("should create the results directory and remove a stale artifact", () => {
    prepareArtifactPath(artifactPath);
    fs.writeFileSync(artifactPath, "stale");

    prepareArtifactPath(artifactPath);

    assert.equal(fs.existsSync(path.dirname(artifactPath)), true);
    assert.equal(fs.existsSync(artifactPath), false);
  });

  it("should move an artifact aside", () => {
    prepareArtifactPath(artifactPath);
    fs.writeFileSync(artifactPath, "partial");

    const moved = quarantineArtifact(artifactPath);

    assert.equal(moved, `${artifactPath}.failed`);
    assert.equal(fs.existsSync(artifactPath), false);
    assert.equal(fs.readFileSync(`${artifactPath}.failed`, "utf8"), "partial");
  });

  it("should have nothing to move aside when there is no artifact", () => {
    assert.equal(quarantineArtifact(artifactPath), undefined);
  });

  it("should collect an artifact with its size", () => {
    prepareArtifactPath(artifactPath);
    fs.writeFileSync(artifactPath, '{"ok":true}');

    assert.deepEqual(collectResult(artifactPath), { path: artifactPath, bytes: 11 });
  });

  it("should fail collection when the artifact is missing", () => {
    assert.throws(
      () => collectResult(artifactPath),
      (err: unknown) => {
        assert.ok(err instanceof BenchmarkError);
        assert.equal(err.code, 0);
        assert.equal(
          err.message,
          `Benchmark exited successfully but wrote no result artifact at ${artifactPath}`
        );
        return true;
      }
    );
  });
});

describe("ProcessBenchmarkRunner", () => {
  let workspace: ReturnType<typeof createWorkspace>;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  const runnerFor = (script: string, env: NodeJS.ProcessEnv = {}) => {
    const config: HarnessConfig = createTestConfig(workspace, {
      env,
      settings: {
        ...TEST_SETTINGS,
        benchmark: {
          command: [process.execPath, "-e", script, "{output}", "{reference}"],
          logLevelVariable: "BENCH_LOG"
        }
      }
    });
    const request = createBenchmarkRequest({
      topologyDir: workspace.topologyDir,
      clientConfigPath: path.join(workspace.topologyDir, "nodes/client.toml"),
      proxy: config.client.proxy,
      reference: { host: "127.0.0.1", port: 9008 },
      artifactPath: config.artifactPath
    });
    return { runner: new ProcessBenchmarkRunner(config, new SilentStageReporter()), request };
  };

  it("should pass the template variables and the log level", async () => {
    const { runner, request } = runnerFor(
      'require("fs").writeFileSync(process.argv[1], process.argv[2] + " " + process.env.BENCH_LOG)',
      { BENCH_LOG_LEVEL: "debug" }
    );

    await runner.execute(request);

    assert.equal(fs.readFileSync(request.artifactPath, "utf8"), "127.0.0.1:9008 debug");
  });

  it("should see the topology directory in its environment", async () => {
    const { runner, request } = runnerFor(
      'require("fs").writeFileSync(process.argv[1], process.env.TOPOLOGY_DIR)'
    );

    await runner.execute(request);

    assert.equal(fs.readFileSync(request.artifactPath, "utf8"), workspace.topologyDir);
  });

  it("should delete a stale artifact before running", async () => {
    const { runner, request } = runnerFor("process.exit(0)");
    fs.mkdirSync(workspace.resultsDir, { recursive: true });
    fs.writeFileSync(request.artifactPath, "from an earlier run");

    await runner.execute(request);

    assert.equal(fs.existsSync(request.artifactPath), false);
  });

  it("should fail with a benchmark error and move the partial artifact aside", async () => {
    const { runner, request } = runnerFor(
      'require("fs").writeFileSync(process.argv[1], "partial"); process.exit(4)'
    );

    await assert.rejects(runner.execute(request), (err: unknown) => {
      assert.ok(err instanceof BenchmarkError);
      assert.equal(err.code, 4);
      return true;
    });
    assert.equal(fs.existsSync(request.artifactPath), false);
    assert.equal(fs.readFileSync(`${request.artifactPath}.failed`, "utf8"), "partial");
  });
});
