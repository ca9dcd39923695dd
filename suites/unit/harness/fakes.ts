/**
 * In-process collaborators for pipeline tests.
 *
 * Each fake appends to a shared call log and can be told to fail, so a test
 * can force a failure at any stage and check what ran afterwards.
 */

import fs from "node:fs";
import path from "node:path";
import tmp from "tmp";
import {
  BenchmarkError,
  type BenchmarkRequest,
  ExternalProcessError,
  type HarnessConfig,
  type HarnessDeps,
  type HarnessError,
  type HarnessSettings,
  InterruptedError,
  type ProcessFailure,
  type Stage,
  type StageReporter,
  loadHarnessConfig
} from "../../../util";

/** `ready` fails setup after the network was started, `setup` before */
export type FaultPoint =
  | "setup"
  | "ready"
  | "client-start"
  | "benchmark"
  | "client-stop"
  | "teardown";

export interface FakeOptions {
  /** Collaborator calls that should fail */
  fail?: FaultPoint[];
  /** Directory the fake provisioner hands out (default: the config's topologyDir) */
  topologyDir?: string;
  /** Whether the fake benchmark writes its artifact (default: true) */
  writeArtifact?: boolean;
  /** Benchmark never finishes on its own; only an abort ends it */
  hangBenchmark?: boolean;
}

export interface FakeHarness {
  deps: HarnessDeps;
  /** Collaborator calls, in order */
  calls: string[];
  requests: BenchmarkRequest[];
  count(call: string): number;
}

export const TEST_SETTINGS: HarnessSettings = {
  resultsDir: "results",
  provisioner: { setup: ["provision", "setup"], teardown: ["provision", "teardown"] },
  client: {
    command: ["client", "-c", "{clientConfig}"],
    configPath: "nodes/client.toml",
    proxy: { host: "127.0.0.1", port: 9150 }
  },
  benchmark: {
    command: ["bench", "--output", "{output}"],
    logLevelVariable: "BENCH_LOG"
  },
  timeouts: {
    provisionMs: 5000,
    clientStartMs: 5000,
    clientStopMs: 1000,
    benchmarkMs: 5000,
    teardownMs: 5000
  }
};

const failure = (command: string, code: number): ProcessFailure => ({
  command,
  code,
  signal: null,
  timedOut: false,
  outputTail: []
});

/**
 * Temporary workspace with a topology directory and a results directory.
 */
export function createWorkspace() {
  const root = tmp.dirSync({ prefix: "harness-test-", unsafeCleanup: true });
  const topologyDir = path.join(root.name, "topology");
  const resultsDir = path.join(root.name, "results");
  fs.mkdirSync(topologyDir);
  return { root: root.name, topologyDir, resultsDir, cleanup: () => root.removeCallback() };
}

export function createTestConfig(
  workspace: { topologyDir: string; resultsDir: string },
  overrides: { target?: string; env?: NodeJS.ProcessEnv; settings?: HarnessSettings } = {}
): HarnessConfig {
  return loadHarnessConfig({
    argv: [overrides.target ?? "tor"],
    env: {
      TOPOLOGY_DIR: workspace.topologyDir,
      HARNESS_RUN_LABEL: "test-run",
      HARNESS_RESULTS_DIR: workspace.resultsDir,
      ...overrides.env
    },
    settings: overrides.settings ?? TEST_SETTINGS
  });
}

export function createFakeHarness(config: HarnessConfig, options: FakeOptions = {}): FakeHarness {
  const calls: string[] = [];
  const requests: BenchmarkRequest[] = [];
  const fails = (point: FaultPoint) => options.fail?.includes(point) ?? false;

  const deps: HarnessDeps = {
    provisioner: {
      async setup(_config, context) {
        calls.push("setup");
        if (fails("setup")) {
          throw new ExternalProcessError(failure("provision setup", 1));
        }
        const handle = { dir: options.topologyDir ?? config.topologyDir ?? "", ephemeral: false };
        context?.started?.(handle);
        if (fails("ready")) {
          throw new ExternalProcessError({ ...failure("provision ready", 0), timedOut: true });
        }
        return handle;
      },
      async teardown() {
        calls.push("teardown");
        if (fails("teardown")) {
          throw new Error("network refused to go down");
        }
      }
    },
    client: {
      async start() {
        calls.push("client-start");
        if (fails("client-start")) {
          throw new ExternalProcessError(failure("client", 1));
        }
        return {
          proxy: config.client.proxy,
          async stop() {
            calls.push("client-stop");
            if (fails("client-stop")) {
              throw new ExternalProcessError(failure("client", 3));
            }
          }
        };
      }
    },
    benchmark: {
      async execute(request, signal) {
        calls.push("benchmark");
        requests.push(request);
        if (options.hangBenchmark) {
          if (signal?.aborted) throw new InterruptedError();
          await new Promise<never>((_resolve, reject) => {
            signal?.addEventListener("abort", () => reject(new InterruptedError()), {
              once: true
            });
          });
        }
        if (options.writeArtifact ?? true) {
          fs.mkdirSync(path.dirname(request.artifactPath), { recursive: true });
          fs.writeFileSync(request.artifactPath, JSON.stringify({ samples: 3 }));
        }
        if (fails("benchmark")) {
          throw new BenchmarkError(failure("bench", 2));
        }
      }
    }
  };

  return {
    deps,
    calls,
    requests,
    count: (call) => calls.filter((c) => c === call).length
  };
}

/**
 * Reporter that records every callback as a short string.
 */
export class RecordingReporter implements StageReporter {
  readonly events: string[] = [];

  constructor(
    private readonly hooks: Partial<Record<"start" | "complete", (stage: Stage) => void>> = {}
  ) {}

  onStageStart(stage: Stage): void {
    this.events.push(`start ${stage}`);
    this.hooks.start?.(stage);
  }

  onStageComplete(stage: Stage, _durationMs: number): void {
    this.events.push(`complete ${stage}`);
    this.hooks.complete?.(stage);
  }

  onStageError(stage: Stage, error: HarnessError): void {
    this.events.push(`error ${stage} ${error.name}`);
  }

  onCommand(label: string, argv: readonly string[]): void {
    this.events.push(`command ${label} ${argv[0]}`);
  }

  onOutput(label: string, line: string): void {
    this.events.push(`output ${label} ${line}`);
  }
}
