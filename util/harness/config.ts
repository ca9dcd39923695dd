/**
 * Harness configuration.
 *
 * Settings (collaborator commands, endpoints, timeouts) come from a YAML
 * file; per-run values (target, topology directory, run label, verbosity)
 * come from the CLI argument and the environment. Both are read once, at
 * the start of a run, into a frozen HarnessConfig that is handed to every
 * stage. Nothing downstream reads `process.env`.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "yaml";
import { ConfigurationError, PreconditionError, errorMessage } from "./errors";
import { assertRunLabel, defaultRunLabel } from "./slug";
import type { Endpoint } from "./types";

export const DEFAULT_SETTINGS_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../config/harness.yml"
);

export interface Timeouts {
  /** Provisioner setup, including the wait for its ready file */
  provisionMs: number;
  /** Until the client's proxy endpoint accepts connections */
  clientStartMs: number;
  /** Grace period after SIGTERM before the client is killed */
  clientStopMs: number;
  benchmarkMs: number;
  teardownMs: number;
}

export interface ProvisionerSettings {
  setup: string[];
  teardown: string[];
  /** File under the topology directory whose presence signals readiness */
  readyFile?: string;
}

export interface ClientSettings {
  command: string[];
  /** Client configuration file, relative to the topology directory */
  configPath: string;
  proxy: Endpoint;
}

export interface BenchmarkSettings {
  command: string[];
  /** Environment variable the workload generator reads its log level from */
  logLevelVariable: string;
}

export interface HarnessSettings {
  resultsDir: string;
  provisioner: ProvisionerSettings;
  client: ClientSettings;
  benchmark: BenchmarkSettings;
  timeouts: Timeouts;
}

export interface HarnessConfig extends Readonly<Omit<HarnessSettings, "resultsDir">> {
  /** Benchmark target as given on the command line; resolved by the pipeline */
  readonly target: string;
  /** TOPOLOGY_DIR as found in the environment, possibly empty */
  readonly topologyDir: string | undefined;
  /** Allocate a fresh temporary topology directory instead of TOPOLOGY_DIR */
  readonly freshTopology: boolean;
  readonly runLabel: string;
  /** Absolute results directory */
  readonly resultsDir: string;
  /** Absolute path of this run's result artifact */
  readonly artifactPath: string;
  readonly verbose: boolean;
  readonly benchLogLevel: string | undefined;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = (field: string, expected: string) =>
  new ConfigurationError(field, `Invalid setting "${field}": expected ${expected}`);

function section(parent: Record<string, unknown>, key: string, at: string) {
  const value = parent[key];
  if (!isRecord(value)) throw invalid(`${at}${key}`, "a mapping");
  return value;
}

function str(parent: Record<string, unknown>, key: string, at: string) {
  const value = parent[key];
  if (typeof value !== "string" || value.length === 0) {
    throw invalid(`${at}${key}`, "a non-empty string");
  }
  return value;
}

function optionalStr(parent: Record<string, unknown>, key: string, at: string) {
  return parent[key] === undefined ? undefined : str(parent, key, at);
}

function command(parent: Record<string, unknown>, key: string, at: string) {
  const value = parent[key];
  if (
    !Array.isArray(value) ||
    value.length === 0 ||
    !value.every((arg): arg is string => typeof arg === "string")
  ) {
    throw invalid(`${at}${key}`, "a non-empty list of strings");
  }
  return value;
}

function positiveInt(
  parent: Record<string, unknown>,
  key: string,
  at: string,
  max = Number.POSITIVE_INFINITY
) {
  const value = parent[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0 || value > max) {
    const expected =
      max === Number.POSITIVE_INFINITY ? "a positive integer" : `an integer between 1 and ${max}`;
    throw invalid(`${at}${key}`, expected);
  }
  return value;
}

/**
 * Checks the shape of parsed settings.
 *
 * @throws ConfigurationError whose `value` is the path of the offending field
 */
export function parseSettings(raw: unknown): HarnessSettings {
  if (!isRecord(raw)) throw invalid("(root)", "a mapping");

  const provisioner = section(raw, "provisioner", "");
  const client = section(raw, "client", "");
  const proxy = section(client, "proxy", "client.");
  const benchmark = section(raw, "benchmark", "");
  const timeouts = section(raw, "timeouts", "");

  return {
    resultsDir: str(raw, "resultsDir", ""),
    provisioner: {
      setup: command(provisioner, "setup", "provisioner."),
      teardown: command(provisioner, "teardown", "provisioner."),
      readyFile: optionalStr(provisioner, "readyFile", "provisioner.")
    },
    client: {
      command: command(client, "command", "client."),
      configPath: str(client, "configPath", "client."),
      proxy: {
        host: str(proxy, "host", "client.proxy."),
        port: positiveInt(proxy, "port", "client.proxy.", 65535)
      }
    },
    benchmark: {
      command: command(benchmark, "command", "benchmark."),
      logLevelVariable: str(benchmark, "logLevelVariable", "benchmark.")
    },
    timeouts: {
      provisionMs: positiveInt(timeouts, "provisionMs", "timeouts."),
      clientStartMs: positiveInt(timeouts, "clientStartMs", "timeouts."),
      clientStopMs: positiveInt(timeouts, "clientStopMs", "timeouts."),
      benchmarkMs: positiveInt(timeouts, "benchmarkMs", "timeouts."),
      teardownMs: positiveInt(timeouts, "teardownMs", "timeouts.")
    }
  };
}

/**
 * Reads and checks the settings file.
 */
export function loadHarnessSettings(file = DEFAULT_SETTINGS_PATH): HarnessSettings {
  let raw: unknown;
  try {
    raw = yaml.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigurationError(file, `Cannot read settings file ${file}: ${errorMessage(err)}`);
  }
  return parseSettings(raw);
}

export interface LoadConfigOptions {
  /** CLI arguments after the script name */
  argv: readonly string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Already-loaded settings; otherwise read from HARNESS_CONFIG or the default file */
  settings?: HarnessSettings;
  now?: Date;
}

/**
 * Builds the run's configuration.
 *
 * @throws PreconditionError when no target is given
 * @throws ConfigurationError for extra arguments, a bad run label or bad settings
 */
export function loadHarnessConfig({
  argv,
  env = process.env,
  cwd = process.cwd(),
  settings,
  now
}: LoadConfigOptions): HarnessConfig {
  const [target, ...extra] = argv;
  if (target === undefined || target === "") {
    throw new PreconditionError(
      "target",
      "No benchmark target given. Usage: runBenchmark <target>"
    );
  }
  if (extra.length > 0) {
    throw new ConfigurationError(extra[0], `Unexpected argument "${extra[0]}"`);
  }

  const resolved = settings ?? loadHarnessSettings(env.HARNESS_CONFIG || DEFAULT_SETTINGS_PATH);

  const runLabel =
    env.HARNESS_RUN_LABEL === undefined
      ? defaultRunLabel(target, now)
      : assertRunLabel(env.HARNESS_RUN_LABEL);
  const resultsDir = path.resolve(cwd, env.HARNESS_RESULTS_DIR || resolved.resultsDir);

  return Object.freeze({
    target,
    topologyDir: env.TOPOLOGY_DIR,
    freshTopology: env.HARNESS_FRESH_TOPOLOGY === "1",
    runLabel,
    resultsDir,
    artifactPath: path.join(resultsDir, `benchmark-${runLabel}.json`),
    verbose: env.HARNESS_VERBOSE === "1",
    benchLogLevel: env.BENCH_LOG_LEVEL || undefined,
    provisioner: resolved.provisioner,
    client: resolved.client,
    benchmark: resolved.benchmark,
    timeouts: resolved.timeouts
  });
}
