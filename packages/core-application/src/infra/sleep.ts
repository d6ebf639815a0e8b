import type { Sleeper } from "../ports/clock";

export const sleep: Sleeper = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, ms));
