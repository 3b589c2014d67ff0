import yargs from "yargs";
import { envDefaults } from "@/lib/rank/config";
import type { RunOptionsInput } from "@/lib/rank/types";

const CLI_SCRIPT_NAME = "leaderboard";
const CLI_USAGE = "$0 <excel> [options]";

/**
 * Flags win over LEADERBOARD_* environment variables, which win over the
 * built-in defaults. Validation of the values is left to runLeaderboard.
 * Usage errors throw instead of exiting, so the caller reports them.
 */
export function parseCliArgs(args: string[], env: NodeJS.ProcessEnv = process.env): RunOptionsInput {
  const defaults = envDefaults(env);
  const argv = yargs(args)
    .scriptName(CLI_SCRIPT_NAME)
    .usage(CLI_USAGE)
    .demandCommand(1, 1, "Path to the workbook (.xlsx) is required")
    .option("out", {
      alias: "o",
      type: "string",
      description: "Output directory",
      default: defaults.outDir,
    })
    .option("pdf", { type: "boolean", description: "Write the landscape PDF", default: false })
    .option("csv", { type: "boolean", description: "Write the CSV", default: false })
    .option("day", {
      alias: "d",
      type: "string",
      description: "Tournament day, used in titles and file names",
      default: defaults.day,
    })
    .option("top-k", {
      alias: "k",
      type: "number",
      description: "Results kept per player",
      default: defaults.topK,
    })
    .option("verbose", { alias: "v", type: "boolean", description: "Print ingest details", default: false })
    .help()
    .alias("help", "h")
    .version(false)
    .strictOptions()
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    })
    .parseSync();

  return {
    excel: String(argv._[0]),
    outDir: argv.out,
    csv: argv.csv,
    pdf: argv.pdf,
    day: argv.day,
    topK: argv["top-k"],
    verbose: argv.verbose,
  };
}
