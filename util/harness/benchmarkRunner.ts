/**
 * Benchmark workload execution.
 *
 * Wraps the external workload generator: it drives traffic through the
 * client's proxy endpoint, compares against the reference endpoint and
 * writes a JSON result artifact. The harness never reads the artifact's
 * fields; it only makes sure the artifact at the run's path belongs to this
 * run and that a failed run does not leave one behind looking like a
 * success.
 */

import fs from "node:fs";
import path from "node:path";
import type { HarnessConfig } from "./config";
import { BenchmarkError, type ProcessFailure } from "./errors";
import { expandCommand, runCommand } from "./process";
import { TOPOLOGY_DIR_VARIABLE } from "./provisioner";
import type { StageReporter } from "./reporter";
import { type Endpoint, formatEndpoint } from "./types";

/**
 * Everything the workload generator needs for one run. Immutable once built.
 */
export interface BenchmarkRequest {
  readonly topologyDir: string;
  /** Client-under-test configuration inside the topology */
  readonly clientConfigPath: string;
  /** Client-under-test proxy endpoint */
  readonly proxy: Readonly<Endpoint>;
  /** Reference peer endpoint */
  readonly reference: Readonly<Endpoint>;
  readonly artifactPath: string;
}

export function createBenchmarkRequest(request: BenchmarkRequest): BenchmarkRequest {
  return Object.freeze({
    ...request,
    proxy: Object.freeze({ ...request.proxy }),
    reference: Object.freeze({ ...request.reference })
  });
}

export interface BenchmarkRunner {
  /**
   * Runs the workload.
   *
   * Resolves once the generator exited successfully; rejects with
   * BenchmarkError otherwise (InterruptedError if `signal` aborts).
   */
  execute(request: BenchmarkRequest, signal?: AbortSignal): Promise<void>;
}

export interface ResultArtifact {
  path: string;
  bytes: number;
}

export const FAILED_ARTIFACT_SUFFIX = ".failed";

/**
 * Creates the artifact's directory and deletes a stale artifact from an
 * earlier run with the same label.
 */
export function prepareArtifactPath(artifactPath: string): void {
  fs.mkdirSync(path.dirname(artifactPath), { recursive: true });
  fs.rmSync(artifactPath, { force: true });
}

/**
 * Moves an artifact left by a failed run out of the way.
 *
 * @returns the new path, or undefined if there was no artifact
 */
export function quarantineArtifact(artifactPath: string): string | undefined {
  if (!fs.existsSync(artifactPath)) return undefined;
  const failedPath = `${artifactPath}${FAILED_ARTIFACT_SUFFIX}`;
  fs.renameSync(artifactPath, failedPath);
  return failedPath;
}

/**
 * Confirms the generator wrote its artifact.
 *
 * @throws BenchmarkError if there is no artifact at `artifactPath`
 */
export function collectResult(artifactPath: string): ResultArtifact {
  if (!fs.existsSync(artifactPath)) {
    throw new BenchmarkError(
      { command: "collect", code: 0, signal: null, timedOut: false, outputTail: [] },
      `Benchmark exited successfully but wrote no result artifact at ${artifactPath}`
    );
  }
  return { path: artifactPath, bytes: fs.statSync(artifactPath).size };
}

/**
 * Template variables available to the benchmark command.
 */
export function benchmarkTemplateVars(request: BenchmarkRequest): Record<string, string> {
  return {
    topologyDir: request.topologyDir,
    clientConfig: request.clientConfigPath,
    proxy: formatEndpoint(request.proxy),
    proxyHost: request.proxy.host,
    proxyPort: String(request.proxy.port),
    reference: formatEndpoint(request.reference),
    referenceHost: request.reference.host,
    referencePort: String(request.reference.port),
    output: request.artifactPath
  };
}

/**
 * Benchmark runner that spawns the configured workload generator.
 */
export class ProcessBenchmarkRunner implements BenchmarkRunner {
  constructor(
    private readonly config: HarnessConfig,
    private readonly reporter: StageReporter
  ) {}

  async execute(request: BenchmarkRequest, signal?: AbortSignal): Promise<void> {
    const argv = expandCommand(this.config.benchmark.command, benchmarkTemplateVars(request));
    const env: Record<string, string> = { [TOPOLOGY_DIR_VARIABLE]: request.topologyDir };
    if (this.config.benchLogLevel) {
      env[this.config.benchmark.logLevelVariable] = this.config.benchLogLevel;
    }

    prepareArtifactPath(request.artifactPath);

    try {
      await runCommand(argv, {
        label: "benchmark",
        reporter: this.reporter,
        env,
        timeoutMs: this.config.timeouts.benchmarkMs,
        signal,
        fail: (failure: ProcessFailure) => new BenchmarkError(failure)
      });
    } catch (err) {
      quarantineArtifact(request.artifactPath);
      throw err;
    }
  }
}
