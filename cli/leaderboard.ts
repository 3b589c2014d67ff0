import { hideBin } from "yargs/helpers";
import { runLeaderboard } from "@/lib/rank/run";
import { parseCliArgs } from "./args";

async function main(): Promise<void> {
  const opts = parseCliArgs(hideBin(process.argv));
  const { outputs } = await runLeaderboard(opts);
  for (const out of outputs) {
    console.log(`Export ${out.format.toUpperCase()}: ${out.path}`);
  }
}

main().catch((err: unknown) => {
  console.error("[leaderboard]", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
