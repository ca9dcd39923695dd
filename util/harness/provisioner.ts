/**
 * Topology provisioning.
 *
 * The provisioner lays out per-node configuration and key material for a
 * simulated network under a topology directory and brings the network up.
 * The harness only ever holds a topology through a TopologyLease, whose
 * release() tears the network down exactly once.
 */

import fs from "node:fs";
import path from "node:path";
import tmp from "tmp";
import type { HarnessConfig } from "./config";
import { ExternalProcessError, PreconditionError, TeardownError, errorMessage } from "./errors";
import { expandCommand, fileExists, runCommand, waitFor } from "./process";
import { renderCommand, type StageReporter } from "./reporter";

export const TOPOLOGY_DIR_VARIABLE = "TOPOLOGY_DIR";

/**
 * Root of all per-node state for one provisioning session.
 */
export interface TopologyHandle {
  /** Topology directory; may be empty if the environment never named one */
  readonly dir: string;
  /** True when the harness allocated `dir` itself and must delete it on teardown */
  readonly ephemeral: boolean;
}

export interface SetupContext {
  signal?: AbortSignal;
  /**
   * Called as soon as something may exist under `handle`. From then on a
   * failed setup is still torn down.
   */
  started?(handle: TopologyHandle): void;
}

export interface Provisioner {
  /**
   * Brings up the test network.
   *
   * A rejection before `context.started` was called means nothing was
   * created and there is nothing to tear down.
   */
  setup(config: HarnessConfig, context?: SetupContext): Promise<TopologyHandle>;

  /**
   * Tears the network down and reclaims all state under the handle.
   */
  teardown(config: HarnessConfig, handle: TopologyHandle): Promise<void>;
}

/**
 * Scoped ownership of a provisioned topology.
 *
 * `release()` runs the provisioner's teardown the first time it is called;
 * later calls return the same promise, so teardown can be requested from
 * several exit paths and still runs exactly once.
 */
export class TopologyLease {
  private released?: Promise<void>;

  constructor(
    private readonly provisioner: Provisioner,
    private readonly config: HarnessConfig,
    readonly handle: TopologyHandle
  ) {}

  get isReleased(): boolean {
    return this.released !== undefined;
  }

  release(): Promise<void> {
    this.released ??= this.provisioner.teardown(this.config, this.handle).catch((err: unknown) => {
      throw err instanceof TeardownError
        ? err
        : new TeardownError(`Teardown failed: ${errorMessage(err)}`, { cause: err });
    });
    return this.released;
  }
}

export interface AcquireOptions {
  signal?: AbortSignal;
  /**
   * Receives the lease as soon as the provisioner started something, before
   * setup finished. If setup then fails the caller still owns the lease.
   */
  onLease?: (lease: TopologyLease) => void;
}

/**
 * Acquires a topology. On success the caller owns the lease and must release it.
 */
export async function acquireTopology(
  provisioner: Provisioner,
  config: HarnessConfig,
  { signal, onLease }: AcquireOptions = {}
): Promise<TopologyLease> {
  const acquired: { lease?: TopologyLease } = {};
  const handle = await provisioner.setup(config, {
    signal,
    started: (startedHandle) => {
      acquired.lease ??= new TopologyLease(provisioner, config, startedHandle);
      onLease?.(acquired.lease);
    }
  });
  return acquired.lease ?? new TopologyLease(provisioner, config, handle);
}

/**
 * Checks the topology directory before anything that depends on it runs.
 *
 * @returns the directory
 * @throws PreconditionError if the directory is empty or does not exist
 */
export function requireTopologyDir(handle: TopologyHandle): string {
  if (handle.dir.trim() === "") {
    throw new PreconditionError(
      TOPOLOGY_DIR_VARIABLE,
      `${TOPOLOGY_DIR_VARIABLE} is unset or empty; the provisioner produced no topology directory`
    );
  }
  if (!fs.existsSync(handle.dir) || !fs.statSync(handle.dir).isDirectory()) {
    throw new PreconditionError(
      TOPOLOGY_DIR_VARIABLE,
      `Topology directory ${handle.dir} does not exist`
    );
  }
  return handle.dir;
}

/**
 * Provisioner backed by external setup/teardown commands.
 *
 * Both commands see the topology directory as TOPOLOGY_DIR. With
 * `freshTopology` the directory is a new temporary one per run, deleted
 * again on teardown, so concurrent runs never share state.
 */
export class ExecProvisioner implements Provisioner {
  private tempDirs = new Map<string, tmp.DirResult>();

  constructor(private readonly reporter: StageReporter) {}

  async setup(config: HarnessConfig, context: SetupContext = {}): Promise<TopologyHandle> {
    const { signal } = context;
    let handle: TopologyHandle;
    if (config.freshTopology) {
      const dir = tmp.dirSync({ prefix: `topology-${config.runLabel}-`, unsafeCleanup: true });
      this.tempDirs.set(dir.name, dir);
      handle = { dir: dir.name, ephemeral: true };
    } else {
      handle = { dir: config.topologyDir ?? "", ephemeral: false };
    }

    const progress = { spawned: false };
    try {
      await runCommand(expandCommand(config.provisioner.setup, this.templateVars(config)), {
        label: "provisioner",
        reporter: this.reporter,
        env: this.env(handle),
        timeoutMs: config.timeouts.provisionMs,
        signal,
        onSpawn: () => {
          progress.spawned = true;
          context.started?.(handle);
        }
      });
      await this.waitUntilReady(config, handle, signal);
    } catch (err) {
      // Once setup ran, the lease holder tears down (and removes the directory)
      if (!progress.spawned) {
        this.removeTempDir(handle);
      }
      throw err;
    }

    return handle;
  }

  async teardown(config: HarnessConfig, handle: TopologyHandle): Promise<void> {
    let failure: unknown;
    try {
      await runCommand(expandCommand(config.provisioner.teardown, this.templateVars(config)), {
        label: "provisioner",
        reporter: this.reporter,
        env: this.env(handle),
        timeoutMs: config.timeouts.teardownMs
      });
    } catch (err) {
      failure = err;
    }

    if (handle.ephemeral) {
      try {
        this.removeTempDir(handle);
      } catch (err) {
        failure ??= err;
      }
    }

    if (failure !== undefined) {
      throw new TeardownError(`Teardown failed: ${errorMessage(failure)}`, { cause: failure });
    }
  }

  private async waitUntilReady(
    config: HarnessConfig,
    handle: TopologyHandle,
    signal?: AbortSignal
  ): Promise<void> {
    const { readyFile } = config.provisioner;
    // Without a directory the pipeline's precondition check reports the problem
    if (!readyFile || handle.dir === "") return;

    const marker = path.join(handle.dir, readyFile);
    const ready = await waitFor(() => fileExists(marker), {
      timeoutMs: config.timeouts.provisionMs,
      signal
    });
    if (!ready) {
      throw new ExternalProcessError(
        {
          command: renderCommand(config.provisioner.setup),
          code: null,
          signal: null,
          timedOut: true,
          outputTail: []
        },
        `Topology never became ready: ${marker} did not appear`
      );
    }
  }

  private templateVars(config: HarnessConfig): Record<string, string> {
    return { target: config.target, runLabel: config.runLabel };
  }

  private env(handle: TopologyHandle): Record<string, string> {
    return handle.dir === "" ? {} : { [TOPOLOGY_DIR_VARIABLE]: handle.dir };
  }

  private removeTempDir(handle: TopologyHandle): void {
    const dir = this.tempDirs.get(handle.dir);
    if (!dir) return;
    this.tempDirs.delete(handle.dir);
    dir.removeCallback();
  }
}
