import { ArtifactDirectory } from "../src/artifacts/artifactStore.js";
import { replayJob } from "../src/artifacts/replay.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/replay_events.ts --job <job_id> [--runs-dir <dir>] [--after <counter>] [--limit <n>] [--json]",
    "",
    "notes:",
    "  - --runs-dir defaults to $RUNS_DIR, then var/runs",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help" || key === "json") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function intArg(value: string | boolean | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === "string" ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isInteger(n)) throw new Error(`--${name} must be an integer`);
  return n;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const job = args.job;
  if (typeof job !== "string") throw new Error(`--job is required\n\n${usage()}`);
  const runsDir = typeof args["runs-dir"] === "string" ? args["runs-dir"] : (process.env.RUNS_DIR ?? "var/runs");

  const lines = await replayJob(ArtifactDirectory.open(runsDir, job), {
    after: intArg(args.after, "after"),
    limit: intArg(args.limit, "limit"),
    json: args.json === true
  });
  process.stdout.write(`${lines.join("\n")}\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
