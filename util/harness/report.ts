/**
 * Rendering of run reports for the CLI.
 */

import { ConfigurationError, ExternalProcessError, type HarnessError } from "./errors";
import type { RunReport } from "./pipeline";

const describeError = (error: HarnessError): string => {
  const where = error.stage ? ` at stage ${error.stage}` : "";
  return `${error.name} (${error.kind})${where}: ${error.message}`;
};

/**
 * Lines summarizing a finished run.
 */
export function formatRunReport(report: RunReport): string[] {
  const seconds = (report.durationMs / 1000).toFixed(2);

  if (report.status === "passed") {
    return [
      `✅ Benchmark ${report.target} (${report.runLabel}) passed in ${seconds}s`,
      `   Result artifact: ${report.result.path} (${report.result.bytes} bytes)`,
      ...report.warnings.map((warning) => `⚠️ ${warning}`)
    ];
  }

  const lines = [
    `❌ Benchmark ${report.target} (${report.runLabel}) failed after ${seconds}s`,
    `   ${describeError(report.primary)}`
  ];
  if (report.primary instanceof ConfigurationError) {
    lines.push(`   Offending value: ${JSON.stringify(report.primary.value)}`);
  }
  if (report.primary instanceof ExternalProcessError && report.primary.outputTail.length > 0) {
    lines.push("   Last output:", ...report.primary.outputTail.map((line) => `     ${line}`));
  }
  if (report.teardown) {
    lines.push(`⚠️ Teardown also failed: ${report.teardown.message}`);
  }
  if (!report.teardownRan) {
    lines.push("   Nothing was provisioned; teardown not needed");
  }
  if (report.quarantinedArtifact) {
    lines.push(`   Partial artifact moved to ${report.quarantinedArtifact}`);
  }
  lines.push(...report.warnings.map((warning) => `⚠️ ${warning}`));
  return lines;
}

/**
 * Process exit code for a run: 0 on success, the primary error's code otherwise.
 */
export function exitCodeFor(report: RunReport): number {
  return report.status === "passed" ? 0 : report.primary.exitCode;
}
