/**
 * Benchmark target table.
 *
 * Maps each symbolic benchmark target to the endpoint of the reference peer
 * the provisioned topology already runs. The table is closed: the reference
 * peer's port is a property of how the provisioner lays out the network, so
 * a new target is an explicit addition here rather than something discovered
 * at run time.
 */

import { ConfigurationError } from "./errors";
import type { Endpoint } from "./types";

export const BENCHMARK_TARGETS = {
  /** Reference client in the provisioned topology, listening on its proxy port */
  tor: { host: "127.0.0.1", port: 9008 }
} as const satisfies Record<string, Endpoint>;

export type BenchmarkTarget = keyof typeof BENCHMARK_TARGETS;

export const isBenchmarkTarget = (name: string): name is BenchmarkTarget =>
  Object.hasOwn(BENCHMARK_TARGETS, name);

/**
 * Resolves a target name to its reference endpoint.
 *
 * @throws ConfigurationError naming the offending value when `name` is not in the table
 */
export function resolveTarget(name: string): Endpoint {
  if (!isBenchmarkTarget(name)) {
    const known = Object.keys(BENCHMARK_TARGETS).join(", ");
    throw new ConfigurationError(
      name,
      `Unknown benchmark target "${name}" (expected one of: ${known})`
    );
  }
  const { host, port } = BENCHMARK_TARGETS[name];
  return { host, port };
}
