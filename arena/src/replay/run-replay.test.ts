import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildMatchSpec } from "../match/match-spec.ts";
import { runMatch } from "../match/run-match.ts";
import { runReplay } from "./run-replay.ts";

describe("runReplay", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "arena-replay-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  const stored = runMatch(buildMatchSpec(7, { combatantCount: 4, baseCount: 1, maxSimSeconds: 3, tickMs: 100 }));

  it("reproduces a stored match exactly", () => {
    const path = join(dir, "match.json");
    writeFileSync(path, JSON.stringify(stored, null, 2));
    const report = runReplay({ replayPath: path });
    expect(report.identical).toBe(true);
    expect(report.result).toEqual(stored);
  });

  it("reports a stored result that was edited", () => {
    const path = join(dir, "edited.json");
    writeFileSync(path, JSON.stringify({ ...stored, hitsLanded: stored.hitsLanded + 1 }));
    expect(runReplay({ replayPath: path }).identical).toBe(false);
  });

  it("refuses a file that is not JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "match?");
    expect(() => runReplay({ replayPath: path })).toThrow(`Invalid replay file ${path}`);
  });
});
