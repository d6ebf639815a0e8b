import type { FileDigest } from "../value-objects/digest-algorithm";

export type DispatcherState = "stopped" | "running";

export type MovedOutcome = {
  status: "moved";
  name: string;
  prefix: string;
  finalName: string;
  source: string;
  destination: string;
  digest: FileDigest | null;
};

export type UnmatchedOutcome = {
  status: "unmatched";
  name: string;
};

export type FailedMoveOutcome = {
  status: "failed";
  stage: "move";
  name: string;
  prefix: string;
  error: Error;
};

// the file was relocated but no digest was recorded for it
export type FailedDigestOutcome = {
  status: "failed";
  stage: "digest";
  name: string;
  prefix: string;
  destination: string;
  error: Error;
};

export type DispatchOutcome =
  | MovedOutcome
  | UnmatchedOutcome
  | FailedMoveOutcome
  | FailedDigestOutcome;

export type CycleSummary = {
  listed: number;
  moved: number;
  unmatched: number;
  failed: number;
  outcomes: DispatchOutcome[];
};

export function summarizeOutcomes(outcomes: DispatchOutcome[]): CycleSummary {
  let moved = 0;
  let unmatched = 0;
  let failed = 0;

  for (const o of outcomes) {
    if (o.status === "moved") moved++;
    else if (o.status === "unmatched") unmatched++;
    else failed++;
  }

  return { listed: outcomes.length, moved, unmatched, failed, outcomes };
}
