export * from "./harness";
export * from "./timer";
