import {
  ConsoleStageReporter,
  HarnessError,
  InterruptHandler,
  createProcessDeps,
  exitCodeFor,
  formatRunReport,
  loadHarnessConfig,
  type RunReport,
  runPipeline
} from "../util";

async function main() {
  const config = loadHarnessConfig({ argv: process.argv.slice(2) });
  const reporter = new ConsoleStageReporter(config.verbose);

  // An interrupt aborts forward progress; the pipeline still stops the client and tears down
  const interrupt = new InterruptHandler().install();

  console.log(`\n=== 🧪 Benchmark: ${config.target} (${config.runLabel}) ===`);
  if (config.verbose) {
    console.table([
      { option: "target", value: config.target },
      { option: "topologyDir", value: config.freshTopology ? "(fresh)" : config.topologyDir },
      { option: "artifact", value: config.artifactPath },
      { option: "logLevel", value: config.benchLogLevel ?? "(default)" }
    ]);
  }

  let report: RunReport;
  try {
    report = await runPipeline(config, createProcessDeps(config, reporter), {
      reporter,
      signal: interrupt.signal
    });
  } finally {
    interrupt.dispose();
  }

  const print = report.status === "passed" ? console.log : console.error;
  for (const line of formatRunReport(report)) {
    print(line);
  }
  process.exitCode = exitCodeFor(report);
}

main().catch((e) => {
  if (e instanceof HarnessError) {
    console.error(`❌ ${e.name}: ${e.message}`);
    process.exitCode = e.exitCode;
    return;
  }
  console.error("Error running benchmark harness:", e);
  process.exitCode = 1;
});
