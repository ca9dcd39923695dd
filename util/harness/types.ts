/**
 * A TCP endpoint, e.g. the client's local proxy or a reference peer.
 */
export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Pipeline stages, in execution order.
 */
export const STAGES = [
  "provision",
  "precondition",
  "client-start",
  "resolve-target",
  "benchmark",
  "collect",
  "client-stop",
  "teardown"
] as const;

export type Stage = (typeof STAGES)[number];

export const formatEndpoint = ({ host, port }: Endpoint): string => `${host}:${port}`;
