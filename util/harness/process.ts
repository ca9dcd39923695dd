/**
 * Process and socket plumbing shared by the collaborator wrappers.
 */

import { type ChildProcess, spawn } from "node:child_process";
import fs from "node:fs";
import net from "node:net";
import type { Readable } from "node:stream";
import stripAnsi from "strip-ansi";
import invariant from "tiny-invariant";
import { sleep } from "../timer";
import {
  ConfigurationError,
  ExternalProcessError,
  InterruptedError,
  PreconditionError,
  type ProcessFailure
} from "./errors";
import { renderCommand, type StageReporter } from "./reporter";
import type { Endpoint } from "./types";

/** Number of output lines kept for failure reports */
export const OUTPUT_TAIL_LINES = 20;

const PLACEHOLDER = /\{([A-Za-z][A-Za-z0-9]*)\}/g;

/**
 * Expands `{name}` placeholders in a command template.
 *
 * References are strict: a placeholder that is not a known variable is a
 * configuration error, and a known variable without a value is a
 * precondition failure. Neither is ever expanded to an empty string.
 */
export function expandCommand(
  template: readonly string[],
  vars: Readonly<Record<string, string | undefined>>
): string[] {
  return template.map((arg) =>
    arg.replace(PLACEHOLDER, (_match, name: string) => {
      if (!Object.hasOwn(vars, name)) {
        throw new ConfigurationError(
          `{${name}}`,
          `Unknown placeholder {${name}} in command: ${renderCommand(template)}`
        );
      }
      const value = vars[name];
      if (value === undefined || value === "") {
        throw new PreconditionError(name, `Command references {${name}}, which is not set`);
      }
      return value;
    })
  );
}

/**
 * Keeps the last lines a process printed and forwards each one to the reporter.
 */
export class OutputTail {
  private lines: string[] = [];
  private partial = new Map<string, string>();

  constructor(
    private readonly label: string,
    private readonly reporter: StageReporter,
    private readonly limit = OUTPUT_TAIL_LINES
  ) {}

  attach(stream: Readable | null, key: string): void {
    stream?.setEncoding("utf8");
    stream?.on("data", (chunk: string) => this.push(key, chunk));
  }

  private push(key: string, chunk: string): void {
    const pieces = ((this.partial.get(key) ?? "") + chunk).split(/\r?\n/);
    this.partial.set(key, pieces.pop() ?? "");
    for (const piece of pieces) {
      this.record(piece);
    }
  }

  private record(raw: string): void {
    const line = stripAnsi(raw);
    this.reporter.onOutput(this.label, line);
    this.lines.push(line);
    if (this.lines.length > this.limit) {
      this.lines.shift();
    }
  }

  flush(): string[] {
    for (const [key, rest] of this.partial) {
      if (rest.length > 0) {
        this.record(rest);
      }
      this.partial.delete(key);
    }
    return [...this.lines];
  }
}

export interface SpawnOptions {
  /** Short collaborator name used in traces */
  label: string;
  reporter: StageReporter;
  /** Variables added on top of the harness's own environment */
  env?: Record<string, string>;
  cwd?: string;
  /** Called once the process is running */
  onSpawn?: (pid: number) => void;
}

export interface CommandOptions extends SpawnOptions {
  /** Kill the process and fail once this many milliseconds have passed */
  timeoutMs?: number;
  /** Aborting kills the process and fails with InterruptedError */
  signal?: AbortSignal;
  /** How long a process gets to exit after SIGTERM before it is killed */
  killGraceMs?: number;
  /** Builds the error for a failed run; defaults to ExternalProcessError */
  fail?: (failure: ProcessFailure) => ExternalProcessError;
}

/** Default time between SIGTERM and SIGKILL */
export const KILL_GRACE_MS = 5000;

/**
 * How long output may keep arriving after a process exited. Background
 * children can hold the pipes open indefinitely.
 */
export const STDIO_DRAIN_MS = 200;

export interface StartedProcess {
  child: ChildProcess;
  tail: OutputTail;
}

/**
 * Spawns a process with piped output and traces the command line.
 */
export function startProcess(argv: readonly string[], options: SpawnOptions): StartedProcess {
  invariant(argv.length > 0, "Command must name an executable");
  const [executable, ...args] = argv;

  options.reporter.onCommand(options.label, argv);

  const child = spawn(executable, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: ["ignore", "pipe", "pipe"]
  });

  const tail = new OutputTail(options.label, options.reporter);
  tail.attach(child.stdout, "stdout");
  tail.attach(child.stderr, "stderr");

  if (child.pid !== undefined) {
    options.onSpawn?.(child.pid);
  }

  return { child, tail };
}

/**
 * Closes our end of a process's output pipes, so processes it left running
 * in the background cannot keep the harness waiting on them.
 */
export function releaseStdio(child: ChildProcess): void {
  child.stdout?.destroy();
  child.stderr?.destroy();
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Runs a command to completion.
 *
 * Resolves on exit code 0. Rejects with `options.fail` (ExternalProcessError
 * by default) on a nonzero exit, a kill signal, a spawn error or a timeout,
 * and with InterruptedError when `options.signal` aborts.
 *
 * Completion is the command's own exit; output still buffered is collected
 * for at most STDIO_DRAIN_MS afterwards. A timed-out or interrupted command
 * gets SIGTERM, then SIGKILL after `killGraceMs`, and the promise settles
 * even if the process never reports its exit.
 */
export function runCommand(argv: readonly string[], options: CommandOptions): Promise<void> {
  const { signal } = options;
  if (signal?.aborted) {
    return Promise.reject(new InterruptedError());
  }

  const fail = options.fail ?? ((failure: ProcessFailure) => new ExternalProcessError(failure));
  const killGraceMs = options.killGraceMs ?? KILL_GRACE_MS;
  const command = renderCommand(argv);
  const { child, tail } = startProcess(argv, options);

  return new Promise((resolve, reject) => {
    let exit: ExitStatus | undefined;
    let timedOut = false;
    let killed = false;
    let settled = false;
    const timers = new Set<NodeJS.Timeout>();

    const later = (ms: number, action: () => void) => {
      if (!settled) timers.add(setTimeout(action, ms));
    };

    const settle = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      for (const timer of timers) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      releaseStdio(child);
      outcome();
    };

    const finish = () =>
      settle(() => {
        const outputTail = tail.flush();
        if (signal?.aborted) {
          reject(new InterruptedError());
        } else if (exit?.code === 0 && !timedOut) {
          resolve();
        } else {
          reject(
            fail({
              command,
              code: exit?.code ?? null,
              signal: exit?.signal ?? (killed ? "SIGKILL" : null),
              timedOut,
              outputTail
            })
          );
        }
      });

    const terminate = () => {
      if (exit) return;
      child.kill("SIGTERM");
      later(killGraceMs, () => {
        killed = true;
        child.kill("SIGKILL");
        later(STDIO_DRAIN_MS, finish);
      });
    };

    function onAbort() {
      terminate();
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    if (options.timeoutMs !== undefined) {
      later(options.timeoutMs, () => {
        if (exit) return;
        timedOut = true;
        terminate();
      });
    }

    child.on("error", (err) => {
      // Without a pid the process never started and no "exit" will follow
      if (child.pid === undefined) {
        settle(() =>
          reject(
            new ExternalProcessError(
              { command, code: null, signal: null, timedOut: false, outputTail: tail.flush() },
              `Failed to spawn ${command}: ${err.message}`
            )
          )
        );
      }
    });

    child.on("exit", (code, exitSignal) => {
      exit = { code, signal: exitSignal };
      later(STDIO_DRAIN_MS, finish);
    });

    // All output arrived; no need to wait out the drain period
    child.on("close", finish);
  });
}

/**
 * Checks whether something accepts TCP connections on `endpoint`.
 */
export function isPortOpen(endpoint: Endpoint, timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect({ host: endpoint.host, port: endpoint.port });
    const done = (open: boolean) => {
      socket.destroy();
      resolve(open);
    };
    socket.setTimeout(timeoutMs, () => done(false));
    socket.once("connect", () => done(true));
    socket.once("error", () => done(false));
  });
}

export interface WaitOptions {
  timeoutMs: number;
  intervalMs?: number;
  signal?: AbortSignal;
}

/**
 * Polls `check` until it returns true or the deadline passes.
 *
 * @returns false if the deadline passed first
 */
export async function waitFor(
  check: () => boolean | Promise<boolean>,
  { timeoutMs, intervalMs = 250, signal }: WaitOptions
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (await check()) {
      return true;
    }
    await sleep(intervalMs, signal);
  }
  return check();
}

export const fileExists = (filePath: string): boolean => fs.existsSync(filePath);
