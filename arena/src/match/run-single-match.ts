import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { ArenaDefaults } from "../config/arena-config.ts";
import { buildMatchSpec, type MatchOverrides } from "./match-spec.ts";
import type { MatchResult } from "./match-types.ts";
import { runMatch } from "./run-match.ts";

export type SingleMatchOptions = MatchOverrides & {
  seed: number;
  outPath: string | null;
  defaults?: ArenaDefaults;
};

export function runSingleMatch(opts: SingleMatchOptions): MatchResult {
  const { seed, outPath, defaults, ...overrides } = opts;
  const result = runMatch(buildMatchSpec(seed, overrides, defaults));
  const out = JSON.stringify(result, null, 2);
  if (outPath) {
    const full = resolve(process.cwd(), outPath);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, out, "utf8");
    console.log(`[arena] wrote ${full}`);
  } else {
    console.log(out);
  }
  return result;
}
