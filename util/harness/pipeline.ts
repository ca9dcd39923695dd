/**
 * The harness pipeline.
 *
 * Runs one benchmark end to end:
 *
 *   provision → precondition → client-start → resolve-target → benchmark
 *     → collect → client-stop → teardown
 *
 * Forward stages are fail-fast: the first failure skips the remaining
 * forward stages. Cleanup stages are not: once the client started it is
 * stopped, and once the provisioner started anything the topology is torn
 * down, exactly once, on every exit path including interruption and a
 * provisioning failure. Teardown is skipped only when provisioning failed
 * before it created anything.
 *
 * The first failure is reported as the primary error. A teardown failure
 * never replaces it; it is reported alongside, or as the primary error when
 * it is the only one.
 */

import invariant from "tiny-invariant";
import {
  type BenchmarkRunner,
  ProcessBenchmarkRunner,
  type ResultArtifact,
  collectResult,
  createBenchmarkRequest,
  quarantineArtifact
} from "./benchmarkRunner";
import {
  type ClientSupervisor,
  ProcessClientSupervisor,
  type RunningClient,
  clientConfigPath
} from "./clientSupervisor";
import type { HarnessConfig } from "./config";
import {
  type HarnessError,
  InterruptedError,
  TeardownError,
  errorMessage,
  toHarnessError
} from "./errors";
import {
  ExecProvisioner,
  type Provisioner,
  type TopologyLease,
  acquireTopology,
  requireTopologyDir
} from "./provisioner";
import { PhaseTimer, SilentStageReporter, type StageReporter } from "./reporter";
import { resolveTarget } from "./targets";
import { STAGES, type Stage } from "./types";

/**
 * The collaborators a run drives. Swap any of them for a fake in tests.
 */
export interface HarnessDeps {
  provisioner: Provisioner;
  client: ClientSupervisor;
  benchmark: BenchmarkRunner;
}

export interface RunOptions {
  reporter?: StageReporter;
  /** Aborting stops forward progress; cleanup stages still run */
  signal?: AbortSignal;
}

export type StageStatus = "ok" | "failed" | "skipped";

export interface StageRecord {
  stage: Stage;
  status: StageStatus;
  durationMs?: number;
}

interface RunReportBase {
  target: string;
  runLabel: string;
  artifactPath: string;
  /** One record per stage, in pipeline order */
  stages: StageRecord[];
  durationMs: number;
  /** Problems that did not change the outcome */
  warnings: string[];
}

export interface PassedRun extends RunReportBase {
  status: "passed";
  result: ResultArtifact;
}

export interface FailedRun extends RunReportBase {
  status: "failed";
  /** First failure of the run */
  primary: HarnessError;
  /** Teardown failure that happened after a different primary failure */
  teardown?: TeardownError;
  /** Whether teardown was attempted (false only when provisioning created nothing) */
  teardownRan: boolean;
  /** Where an artifact left by the failed run was moved to */
  quarantinedArtifact?: string;
}

export type RunReport = PassedRun | FailedRun;

/**
 * Collaborators backed by the configured external commands.
 */
export function createProcessDeps(config: HarnessConfig, reporter: StageReporter): HarnessDeps {
  return {
    provisioner: new ExecProvisioner(reporter),
    client: new ProcessClientSupervisor(reporter),
    benchmark: new ProcessBenchmarkRunner(config, reporter)
  };
}

class StageTracker {
  private records = new Map<Stage, StageRecord>();
  lastStarted: Stage = "provision";

  constructor(private readonly reporter: StageReporter) {}

  async run<T>(stage: Stage, body: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    this.lastStarted = stage;
    const timer = new PhaseTimer();
    try {
      if (signal?.aborted) {
        throw new InterruptedError(`Run interrupted before ${stage}`);
      }
      this.reporter.onStageStart(stage);
      const value = await body();
      const durationMs = timer.elapsed();
      this.records.set(stage, { stage, status: "ok", durationMs });
      this.reporter.onStageComplete(stage, durationMs);
      return value;
    } catch (err) {
      const error = toHarnessError(err, stage);
      this.records.set(stage, { stage, status: "failed", durationMs: timer.elapsed() });
      this.reporter.onStageError(stage, error);
      throw error;
    }
  }

  list(): StageRecord[] {
    return STAGES.map((stage) => this.records.get(stage) ?? { stage, status: "skipped" });
  }
}

/**
 * Runs the benchmark pipeline for `config.target`.
 *
 * Never rejects: every failure is classified and returned in the report.
 */
export async function runPipeline(
  config: HarnessConfig,
  deps: HarnessDeps,
  { reporter = new SilentStageReporter(), signal }: RunOptions = {}
): Promise<RunReport> {
  const timer = new PhaseTimer();
  const stages = new StageTracker(reporter);
  const warnings: string[] = [];
  const base = (): RunReportBase => ({
    target: config.target,
    runLabel: config.runLabel,
    artifactPath: config.artifactPath,
    stages: stages.list(),
    durationMs: timer.elapsed(),
    warnings
  });

  // Set as soon as the provisioner started something, even if setup then fails
  const acquired: { lease?: TopologyLease } = {};
  let primary: HarnessError | undefined;
  try {
    acquired.lease = await stages.run(
      "provision",
      () =>
        acquireTopology(deps.provisioner, config, {
          signal,
          onLease: (lease) => {
            acquired.lease = lease;
          }
        }),
      signal
    );
  } catch (err) {
    primary = toHarnessError(err, "provision");
  }

  const lease = acquired.lease;
  if (!lease) {
    invariant(primary, "Provisioning finished without a topology or an error");
    return { ...base(), status: "failed", primary, teardownRan: false };
  }

  let client: RunningClient | undefined;
  let result: ResultArtifact | undefined;

  if (!primary) {
    try {
      const topologyDir = await stages.run(
        "precondition",
        () => requireTopologyDir(lease.handle),
        signal
      );
      client = await stages.run(
        "client-start",
        () => deps.client.start({ config, topologyDir, signal }),
        signal
      );
      const reference = await stages.run(
        "resolve-target",
        () => resolveTarget(config.target),
        signal
      );
      const request = createBenchmarkRequest({
        topologyDir,
        clientConfigPath: clientConfigPath(config, topologyDir),
        proxy: client.proxy,
        reference,
        artifactPath: config.artifactPath
      });
      await stages.run("benchmark", () => deps.benchmark.execute(request, signal), signal);
      result = await stages.run("collect", () => collectResult(config.artifactPath), signal);
    } catch (err) {
      primary = toHarnessError(err, stages.lastStarted);
    }
  }

  if (client) {
    const running = client;
    try {
      await stages.run("client-stop", () => running.stop());
    } catch (err) {
      primary ??= toHarnessError(err, "client-stop");
    }
  }

  let teardown: TeardownError | undefined;
  try {
    await stages.run("teardown", () => lease.release());
  } catch (err) {
    const error = toHarnessError(err, "teardown");
    teardown =
      error instanceof TeardownError
        ? error
        : new TeardownError(`Teardown failed: ${error.message}`, { cause: error });
  }

  const failure = primary ?? teardown;
  if (!failure) {
    invariant(result, "Forward stages finished without a result or an error");
    return { ...base(), status: "passed", result };
  }

  let quarantinedArtifact: string | undefined;
  if (!result) {
    try {
      quarantinedArtifact = quarantineArtifact(config.artifactPath);
    } catch (err) {
      warnings.push(`Could not move aside artifact ${config.artifactPath}: ${errorMessage(err)}`);
    }
  }

  return {
    ...base(),
    status: "failed",
    primary: failure,
    // When teardown is the only failure it is the primary error, not a second one
    teardown: primary ? teardown : undefined,
    teardownRan: true,
    quarantinedArtifact
  };
}
