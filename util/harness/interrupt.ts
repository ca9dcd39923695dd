/**
 * Turns SIGINT and SIGTERM into an abort.
 *
 * The first signal aborts the run so the pipeline can stop the client and
 * tear down. Later signals only print a notice: the handler stays installed
 * until disposed, so a second Ctrl-C cannot kill the harness halfway
 * through teardown.
 */
export class InterruptHandler {
  readonly controller = new AbortController();

  constructor(
    private readonly notify: (message: string) => void = console.log,
    private readonly signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"]
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  readonly handle = (signal: NodeJS.Signals): void => {
    if (this.controller.signal.aborted) {
      this.notify(`⚠️ Received ${signal} again, teardown in progress...`);
      return;
    }
    this.notify(`\n⚠️ Received ${signal}, tearing down...`);
    this.controller.abort();
  };

  install(): this {
    for (const signal of this.signals) {
      process.on(signal, this.handle);
    }
    return this;
  }

  dispose(): void {
    for (const signal of this.signals) {
      process.off(signal, this.handle);
    }
  }
}
