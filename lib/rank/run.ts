import type { IngestReport } from "@/lib/domain/types";
import { exportCsv } from "@/lib/csv/exportLeaderboard";
import { aggregateWithReport } from "@/lib/ingest/normalize";
import { readWorkbookFile } from "@/lib/ingest/parse";
import { formatIssues } from "@/lib/ingest/schemas";
import { exportPdf } from "@/lib/pdf/exportLeaderboard";
import { csvFileName, pdfFileName } from "./config";
import { rank } from "./rank";
import { RunOptionsSchema, type ExportOutput, type RunOptions, type RunOptionsInput, type RunResult } from "./types";

export function parseRunOptions(input: RunOptionsInput): RunOptions {
  const parsed = RunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid options: ${formatIssues(parsed.error)}`);
  }
  // Neither format asked for → both
  if (!parsed.data.csv && !parsed.data.pdf) {
    return { ...parsed.data, csv: true, pdf: true };
  }
  return parsed.data;
}

export function describeReport(report: IngestReport): string {
  return (
    `${report.sheets} sheet(s), ${report.rowsScanned} row(s) scanned, ` +
    `${report.contributions} result(s) for ${report.players} player(s); ` +
    `skipped ${report.dropped.emptyIdentity} without name, ${report.dropped.invalidScore} without score, ` +
    `${report.blankRows} blank; ${report.defaultedPoints} result(s) with points defaulted to 0`
  );
}

export async function runLeaderboard(input: RunOptionsInput): Promise<RunResult> {
  const opts = parseRunOptions(input);
  const t0 = performance.now();

  const sheets = await readWorkbookFile(opts.excel, opts.layout);
  const { players, report } = aggregateWithReport(sheets);
  if (opts.verbose) console.debug("[ingest]", describeReport(report));
  const dropped = report.dropped.emptyIdentity + report.dropped.invalidScore;
  if (dropped > 0) {
    console.warn(`[ingest] skipped ${dropped} incomplete row(s) in ${opts.excel}`);
  }

  const table = rank(players, opts.topK);
  if (opts.verbose) {
    console.debug(`[rank] ${table.rows.length} player(s) ranked, top ${table.topK}`);
  }

  const outputs: ExportOutput[] = [];
  if (opts.csv) {
    outputs.push({ format: "csv", path: await exportCsv(table, opts.outDir, csvFileName(opts.day)) });
  }
  if (opts.pdf) {
    outputs.push({ format: "pdf", path: await exportPdf(table, opts.outDir, pdfFileName(opts.day), opts.day) });
  }

  if (opts.verbose) {
    console.debug(`[export] done in ${Math.round(performance.now() - t0)}ms`);
  }
  return { outputs, report, table };
}
