import type { PlayerRecords, RankedTable } from "@/lib/domain/types";
import { formatIssues } from "@/lib/ingest/schemas";
import { buildHeaders } from "@/lib/table/columns";
import { buildPlayerRow } from "./algorithms/topK";
import { assignDenseRanks, sortByTotals, sortForPresentation } from "./algorithms/ranking";
import { TopKSchema } from "./types";

export function assertTopK(k: number): number {
  const parsed = TopKSchema.safeParse(k);
  if (!parsed.success) {
    throw new Error(`Invalid top-k ${k}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// Pure: fresh table on every call, inputs untouched
export function rank(players: PlayerRecords, k: number): RankedTable {
  const topK = assertTopK(k);
  const perPlayer = Array.from(players.values(), (record) => buildPlayerRow(record, topK));
  const ranked = assignDenseRanks(sortByTotals(perPlayer));
  return {
    topK,
    headers: buildHeaders(topK),
    rows: sortForPresentation(ranked),
  };
}
