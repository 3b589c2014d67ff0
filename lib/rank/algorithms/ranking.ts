import type { RankedRow } from "@/lib/domain/types";
import { compareIdentity } from "@/lib/ingest/identity";
import type { PlayerTotals } from "@/lib/rank/types";

function sameTotals(a: PlayerTotals, b: PlayerTotals): boolean {
  return a.totalPoints === b.totalPoints && a.totalScore === b.totalScore;
}

// totalPoints desc, totalScore desc, then names so ties have a fixed order
export function compareByTotals(a: PlayerTotals, b: PlayerTotals): number {
  if (a.totalPoints !== b.totalPoints) return b.totalPoints - a.totalPoints;
  if (a.totalScore !== b.totalScore) return b.totalScore - a.totalScore;
  return compareIdentity(a.identity, b.identity);
}

export function sortByTotals<T extends PlayerTotals>(rows: readonly T[]): T[] {
  return rows.slice().sort(compareByTotals);
}

/**
 * Competition ranking over rows already ordered by {@link sortByTotals}:
 * a row whose totals differ from the previous row's takes its 1-based
 * position, otherwise it shares the previous rank (1, 2, 2, 4).
 */
export function assignDenseRanks(sorted: readonly PlayerTotals[]): RankedRow[] {
  let rank = 0;
  let prev: PlayerTotals | undefined;
  return sorted.map((row, i) => {
    if (!prev || !sameTotals(prev, row)) rank = i + 1;
    prev = row;
    return { ...row, rank };
  });
}

export function sortForPresentation(rows: readonly RankedRow[]): RankedRow[] {
  return rows.slice().sort((a, b) => a.rank - b.rank || compareIdentity(a.identity, b.identity));
}
