/**
 * Supervision of the client under test.
 *
 * The client runs in the background for the whole benchmark: start()
 * returns once its local proxy endpoint accepts connections, and the
 * returned handle's stop() terminates it again.
 */

import type { ChildProcess } from "node:child_process";
import path from "node:path";
import type { HarnessConfig } from "./config";
import { ExternalProcessError, type ProcessFailure, errorMessage } from "./errors";
import {
  type OutputTail,
  expandCommand,
  isPortOpen,
  releaseStdio,
  startProcess,
  waitFor
} from "./process";
import { TOPOLOGY_DIR_VARIABLE } from "./provisioner";
import { renderCommand, type StageReporter } from "./reporter";
import { type Endpoint, formatEndpoint } from "./types";

export interface ClientStartContext {
  config: HarnessConfig;
  /** Checked topology directory */
  topologyDir: string;
  signal?: AbortSignal;
}

export interface RunningClient {
  /** Local proxy endpoint the workload is driven through */
  readonly proxy: Endpoint;

  /**
   * Terminates the client and waits for it to exit. Idempotent.
   *
   * Rejects if the client had already died on its own with a failure.
   */
  stop(): Promise<void>;
}

export interface ClientSupervisor {
  start(context: ClientStartContext): Promise<RunningClient>;
}

/**
 * Path of the client's configuration file inside the topology.
 */
export const clientConfigPath = (config: HarnessConfig, topologyDir: string): string =>
  path.join(topologyDir, config.client.configPath);

interface ProcessState {
  exit?: { code: number | null; signal: NodeJS.Signals | null };
  spawnError?: Error;
}

class ProcessRunningClient implements RunningClient {
  private stopping?: Promise<void>;

  constructor(
    readonly proxy: Endpoint,
    private readonly child: ChildProcess,
    private readonly exited: Promise<void>,
    private readonly state: ProcessState,
    private readonly failure: () => ProcessFailure,
    private readonly graceMs: number
  ) {}

  stop(): Promise<void> {
    this.stopping ??= this.terminate();
    return this.stopping;
  }

  private async terminate(): Promise<void> {
    if (this.child.pid === undefined) return;

    if (this.state.exit) {
      releaseStdio(this.child);
      const { code, signal } = this.state.exit;
      if (code !== 0 || signal !== null) {
        throw new ExternalProcessError(
          this.failure(),
          `Client exited unexpectedly (${signal ?? `code ${code}`}) before it was stopped`
        );
      }
      return;
    }

    try {
      this.child.kill("SIGTERM");
      if (await this.exitsWithin(this.graceMs)) return;

      this.child.kill("SIGKILL");
      if (await this.exitsWithin(this.graceMs)) return;

      throw new ExternalProcessError(
        this.failure(),
        `Client did not exit within ${this.graceMs}ms of SIGKILL`
      );
    } finally {
      releaseStdio(this.child);
    }
  }

  private async exitsWithin(ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    const exited = await Promise.race([this.exited.then(() => true), expired]);
    clearTimeout(timer);
    return exited;
  }
}

/**
 * Client supervisor that spawns the configured client command.
 *
 * Template variables: `{topologyDir}`, `{clientConfig}`, `{proxy}`,
 * `{proxyHost}`, `{proxyPort}`.
 */
export class ProcessClientSupervisor implements ClientSupervisor {
  constructor(private readonly reporter: StageReporter) {}

  async start({ config, topologyDir, signal }: ClientStartContext): Promise<RunningClient> {
    const proxy = config.client.proxy;
    const argv = expandCommand(config.client.command, {
      topologyDir,
      clientConfig: clientConfigPath(config, topologyDir),
      proxy: formatEndpoint(proxy),
      proxyHost: proxy.host,
      proxyPort: String(proxy.port)
    });

    const { child, tail } = startProcess(argv, {
      label: "client",
      reporter: this.reporter,
      env: { [TOPOLOGY_DIR_VARIABLE]: topologyDir }
    });

    const state: ProcessState = {};
    const exited = new Promise<void>((resolve) => {
      child.once("exit", (code, exitSignal) => {
        state.exit = { code, signal: exitSignal };
        resolve();
      });
    });
    child.once("error", (err) => {
      state.spawnError = err;
    });

    const failure = (timedOut = false): ProcessFailure =>
      describeExit(renderCommand(argv), state, timedOut, tail);
    const client = new ProcessRunningClient(
      proxy,
      child,
      exited,
      state,
      failure,
      config.timeouts.clientStopMs
    );

    try {
      const ready = await waitFor(
        async () => state.exit !== undefined || state.spawnError !== undefined || isPortOpen(proxy),
        { timeoutMs: config.timeouts.clientStartMs, signal }
      );

      if (state.spawnError) {
        throw new ExternalProcessError(
          failure(),
          `Failed to spawn client: ${state.spawnError.message}`
        );
      }
      if (state.exit) {
        throw new ExternalProcessError(failure(), "Client exited before its proxy became ready");
      }
      if (!ready) {
        throw new ExternalProcessError(
          failure(true),
          `Client proxy ${formatEndpoint(proxy)} not ready after ${config.timeouts.clientStartMs}ms`
        );
      }
    } catch (err) {
      // The pipeline only stops clients that started; don't leave this one behind
      if (!state.exit && !state.spawnError) {
        await client.stop().catch((stopError: unknown) => {
          const reason = errorMessage(stopError);
          this.reporter.onOutput("client", `Stopping the client also failed: ${reason}`);
        });
      } else {
        releaseStdio(child);
      }
      throw err;
    }

    return client;
  }
}

function describeExit(
  command: string,
  state: ProcessState,
  timedOut: boolean,
  tail: OutputTail
): ProcessFailure {
  return {
    command,
    code: state.exit?.code ?? null,
    signal: state.exit?.signal ?? null,
    timedOut,
    outputTail: tail.flush()
  };
}
