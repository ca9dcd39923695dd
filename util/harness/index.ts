export * from "./benchmarkRunner";
export * from "./clientSupervisor";
export * from "./config";
export * from "./errors";
export * from "./interrupt";
export * from "./pipeline";
export * from "./process";
export * from "./provisioner";
export * from "./report";
export * from "./reporter";
export * from "./slug";
export * from "./targets";
export * from "./types";
