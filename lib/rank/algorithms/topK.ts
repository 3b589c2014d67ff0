import type { Contribution, PlayerRecord } from "@/lib/domain/types";
import type { PlayerTotals } from "@/lib/rank/types";

// points desc, then score desc
export function compareContributions(a: Contribution, b: Contribution): number {
  if (a.points !== b.points) return b.points - a.points;
  if (a.score !== b.score) return b.score - a.score;
  return 0;
}

/**
 * Best `k` contributions by points, score breaking ties.
 * Array#sort is stable, so identical pairs keep their encounter order.
 */
export function selectTopK(contributions: readonly Contribution[], k: number): Contribution[] {
  return contributions.slice().sort(compareContributions).slice(0, k);
}

export function buildPlayerRow(record: PlayerRecord, k: number): PlayerTotals {
  const kept = selectTopK(record.contributions, k);
  let totalScore = 0;
  let totalPoints = 0;
  for (const c of kept) {
    totalScore += c.score;
    totalPoints += c.points;
  }
  const slots: (number | null)[] = kept.map((c) => c.points);
  while (slots.length < k) slots.push(null);
  return {
    identity: record.identity,
    playCount: kept.length,
    slots,
    totalScore,
    totalPoints,
  };
}
