/**
 * Unit tests for settings parsing and run configuration.
 */

import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import tmp from "tmp";
import yaml from "yaml";
import {
  ConfigurationError,
  DEFAULT_SETTINGS_PATH,
  PreconditionError,
  loadHarnessConfig,
  loadHarnessSettings,
  parseSettings
} from "../../../util";
import { TEST_SETTINGS } from "./fakes";

const expectConfigurationError = (value: string, message: string) => (err: unknown) => {
  assert.ok(err instanceof ConfigurationError);
  assert.equal(err.value, value);
  assert.equal(err.message, message);
  return true;
};

describe("Harness settings", () => {
  let dir: tmp.DirResult;

  const writeSettings = (name: string, content: string) => {
    const file = path.join(dir.name, name);
    fs.writeFileSync(file, content);
    return file;
  };

  before(() => {
    dir = tmp.dirSync({ prefix: "harness-settings-", unsafeCleanup: true });
  });

  after(() => {
    dir.removeCallback();
  });

  it("should load the bundled settings file", () => {
    const settings = loadHarnessSettings(DEFAULT_SETTINGS_PATH);

    assert.equal(settings.resultsDir, "results");
    assert.equal(settings.provisioner.readyFile, "network-ready");
    assert.deepEqual(settings.client.proxy, { host: "127.0.0.1", port: 9150 });
    assert.equal(settings.client.configPath, "nodes/client.toml");
    assert.equal(settings.benchmark.logLevelVariable, "BENCH_LOG");
    assert.ok(settings.benchmark.command.includes("{reference}"));
    assert.equal(settings.timeouts.clientStopMs, 10000);
  });

  it("should round-trip settings written as YAML", () => {
    const file = writeSettings("valid.yml", yaml.stringify(TEST_SETTINGS));

    assert.deepEqual(loadHarnessSettings(file), {
      ...TEST_SETTINGS,
      provisioner: { ...TEST_SETTINGS.provisioner, readyFile: undefined }
    });
  });

  it("should name the offending field of an invalid setting", () => {
    const raw = {
      ...TEST_SETTINGS,
      client: { ...TEST_SETTINGS.client, proxy: { host: "127.0.0.1", port: 70000 } }
    };

    assert.throws(
      () => parseSettings(raw),
      expectConfigurationError(
        "client.proxy.port",
        'Invalid setting "client.proxy.port": expected an integer between 1 and 65535'
      )
    );
  });

  it("should ask for a positive integer where there is no upper bound", () => {
    for (const clientStartMs of [0, -5, 1.5]) {
      const raw = { ...TEST_SETTINGS, timeouts: { ...TEST_SETTINGS.timeouts, clientStartMs } };

      assert.throws(
        () => parseSettings(raw),
        expectConfigurationError(
          "timeouts.clientStartMs",
          'Invalid setting "timeouts.clientStartMs": expected a positive integer'
        )
      );
    }
  });

  it("should reject an empty command", () => {
    const raw = { ...TEST_SETTINGS, benchmark: { ...TEST_SETTINGS.benchmark, command: [] } };

    assert.throws(
      () => parseSettings(raw),
      expectConfigurationError(
        "benchmark.command",
        'Invalid setting "benchmark.command": expected a non-empty list of strings'
      )
    );
  });

  it("should reject a missing section", () => {
    const { timeouts: _timeouts, ...raw } = TEST_SETTINGS;

    assert.throws(
      () => parseSettings(raw),
      expectConfigurationError("timeouts", 'Invalid setting "timeouts": expected a mapping')
    );
  });

  it("should reject a document that is not a mapping", () => {
    const file = writeSettings("list.yml", "- a\n- b\n");

    assert.throws(
      () => loadHarnessSettings(file),
      expectConfigurationError("(root)", 'Invalid setting "(root)": expected a mapping')
    );
  });

  it("should report an unreadable settings file", () => {
    const file = path.join(dir.name, "missing.yml");

    assert.throws(
      () => loadHarnessSettings(file),
      (err: unknown) => {
        assert.ok(err instanceof ConfigurationError);
        assert.equal(err.value, file);
        assert.ok(err.message.startsWith(`Cannot read settings file ${file}: `));
        return true;
      }
    );
  });
});

describe("loadHarnessConfig", () => {
  const now = new Date(Date.UTC(2024, 2, 5, 7, 8, 9));

  it("should build a frozen configuration from the environment", () => {
    const config = loadHarnessConfig({
      argv: ["tor"],
      env: {
        TOPOLOGY_DIR: "/work/topology",
        HARNESS_FRESH_TOPOLOGY: "1",
        HARNESS_VERBOSE: "1",
        BENCH_LOG_LEVEL: "debug"
      },
      cwd: "/work",
      settings: TEST_SETTINGS,
      now
    });

    assert.equal(config.target, "tor");
    assert.equal(config.topologyDir, "/work/topology");
    assert.equal(config.freshTopology, true);
    assert.equal(config.verbose, true);
    assert.equal(config.benchLogLevel, "debug");
    assert.equal(config.runLabel, "tor-20240305-070809");
    assert.equal(config.resultsDir, "/work/results");
    assert.equal(config.artifactPath, "/work/results/benchmark-tor-20240305-070809.json");
    assert.deepEqual(config.client, TEST_SETTINGS.client);
    assert.ok(Object.isFrozen(config));
  });

  it("should default optional switches to off", () => {
    const config = loadHarnessConfig({
      argv: ["tor"],
      env: { BENCH_LOG_LEVEL: "" },
      cwd: "/work",
      settings: TEST_SETTINGS,
      now
    });

    assert.equal(config.topologyDir, undefined);
    assert.equal(config.freshTopology, false);
    assert.equal(config.verbose, false);
    assert.equal(config.benchLogLevel, undefined);
  });

  it("should take the run label and results directory from the environment", () => {
    const config = loadHarnessConfig({
      argv: ["tor"],
      env: { HARNESS_RUN_LABEL: "nightly_01", HARNESS_RESULTS_DIR: "out" },
      cwd: "/work",
      settings: TEST_SETTINGS
    });

    assert.equal(config.runLabel, "nightly_01");
    assert.equal(config.artifactPath, "/work/out/benchmark-nightly_01.json");
  });

  it("should accept an unknown target and leave it to target resolution", () => {
    const config = loadHarnessConfig({ argv: ["I2P"], env: {}, settings: TEST_SETTINGS, now });

    assert.equal(config.target, "I2P");
    assert.equal(config.runLabel, "i2p-20240305-070809");
  });

  it("should require a target", () => {
    for (const argv of [[], [""]]) {
      assert.throws(
        () => loadHarnessConfig({ argv, env: {}, settings: TEST_SETTINGS }),
        (err: unknown) => {
          assert.ok(err instanceof PreconditionError);
          assert.equal(err.variable, "target");
          return true;
        }
      );
    }
  });

  it("should reject extra arguments", () => {
    assert.throws(
      () => loadHarnessConfig({ argv: ["tor", "extra"], env: {}, settings: TEST_SETTINGS }),
      expectConfigurationError("extra", 'Unexpected argument "extra"')
    );
  });

  it("should reject an invalid run label", () => {
    assert.throws(
      () =>
        loadHarnessConfig({
          argv: ["tor"],
          env: { HARNESS_RUN_LABEL: "Bad Label" },
          settings: TEST_SETTINGS
        }),
      expectConfigurationError(
        "Bad Label",
        'Invalid run label "Bad Label": contains disallowed character "B"'
      )
    );
  });

  it("should read settings from HARNESS_CONFIG", () => {
    const dir = tmp.dirSync({ prefix: "harness-env-", unsafeCleanup: true });
    try {
      const file = path.join(dir.name, "custom.yml");
      fs.writeFileSync(file, yaml.stringify({ ...TEST_SETTINGS, resultsDir: "custom-results" }));

      const config = loadHarnessConfig({
        argv: ["tor"],
        env: { HARNESS_CONFIG: file, HARNESS_RUN_LABEL: "custom" },
        cwd: "/work"
      });

      assert.equal(config.artifactPath, "/work/custom-results/benchmark-custom.json");
    } finally {
      dir.removeCallback();
    }
  });
});
