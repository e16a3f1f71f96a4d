import { runSingleMatch } from "./match/run-single-match.ts";
import { runReplay } from "./replay/run-replay.ts";
import { asTheftPolicy, loadArenaDefaults } from "./config/arena-config.ts";
import { startGrpcServer } from "./grpc/server.ts";

type Args = Record<string, string | boolean>;

const DEFAULT_GRPC_PORT = 50061;

function parseArgs(argv: string[]): { cmd: string; args: Args } {
  const [cmd = ""] = argv;
  const args: Args = {};
  for (let i = 1; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      args[key] = true;
      continue;
    }
    args[key] = next;
    i += 1;
  }
  return { cmd, args };
}

function asNumber(value: unknown): number | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function asString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim().length > 0 ? value : fallback;
}

async function main(): Promise<void> {
  const { cmd, args } = parseArgs(process.argv.slice(2));
  const defaults = loadArenaDefaults();
  if (cmd === "match") {
    const theftPolicy = args.theftPolicy === undefined ? undefined : asTheftPolicy(args.theftPolicy);
    if (args.theftPolicy !== undefined && !theftPolicy) {
      throw new Error("--theftPolicy must be exclusive or cumulative");
    }
    runSingleMatch({
      seed: asNumber(args.seed) ?? Date.now() % 1_000_000,
      maxSimSeconds: asNumber(args.maxSimSeconds),
      tickMs: asNumber(args.tickMs),
      combatantCount: asNumber(args.combatants),
      baseCount: asNumber(args.bases),
      baseAntimatter: asNumber(args.baseAntimatter),
      theftPolicy,
      gunneryCadenceMs: asNumber(args.gunneryCadenceMs),
      gunneryRange: asNumber(args.gunneryRange),
      patrolSpeed: asNumber(args.patrolSpeed),
      outPath: typeof args.out === "string" ? args.out : null,
      defaults,
    });
    return;
  }
  if (cmd === "replay") {
    const replayPath = asString(args.file, "");
    if (!replayPath) {
      throw new Error("replay requires --file <path>");
    }
    const { identical } = runReplay({ replayPath });
    if (!identical) {
      process.exitCode = 1;
    }
    return;
  }
  if (cmd === "serve") {
    const port = asNumber(args.port) ?? defaults.grpcPort ?? DEFAULT_GRPC_PORT;
    const server = await startGrpcServer(port);
    process.once("SIGINT", () => {
      console.log("[arena grpc] shutting down");
      server.tryShutdown((err) => {
        if (err) {
          console.error(`[arena grpc] shutdown failed: ${err.message}`);
          process.exitCode = 1;
        }
      });
    });
    return;
  }
  console.log(
    [
      "arena cli",
      "",
      "Commands:",
      "  match --seed 123 --out match.json",
      "  match --seed 7 --combatants 20 --bases 3 --theftPolicy cumulative",
      "  replay --file match.json",
      "  serve --port 50061",
      "",
      "Match flags:",
      "  --maxSimSeconds 240 --tickMs 16.67 --baseAntimatter 5000 --gunneryCadenceMs 500 --gunneryRange 9000 --patrolSpeed 5",
      "",
      "Global defaults:",
      "  arena.config.json (and/or env vars like ARENA_COMBATANT_COUNT)",
    ].join("\n"),
  );
}

try {
  await main();
} catch (err) {
  console.error(`[arena] ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
