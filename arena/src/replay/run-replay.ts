import { readFileSync } from "node:fs";
import { parseMatchSpec } from "../match/match-spec.ts";
import type { MatchResult } from "../match/match-types.ts";
import { runMatch } from "../match/run-match.ts";

export type ReplayReport = {
  identical: boolean;
  result: MatchResult;
};

function readReplay(path: string): unknown {
  const raw = readFileSync(path, "utf8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid replay file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Re-runs the match settings stored in a result file and compares the outcome. */
export function runReplay(opts: { replayPath: string }): ReplayReport {
  const stored = readReplay(opts.replayPath);
  const specSource = stored !== null && typeof stored === "object" ? Reflect.get(stored, "spec") : undefined;
  const result = runMatch(parseMatchSpec(specSource));
  const identical = JSON.stringify(stored) === JSON.stringify(result);
  console.log(`[arena] replay ${identical ? "matches" : "differs from"} ${opts.replayPath}`);
  return { identical, result };
}
