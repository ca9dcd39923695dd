import { setTimeout as delay } from "node:timers/promises";

export const sleep = (ms: number, signal?: AbortSignal) => delay(ms, undefined, { signal });
