import { describe, it, expect } from "vitest";
import type { PlayerRecords, RankedRow, RawRow, SheetRows } from "@/lib/domain/types";
import { aggregate } from "@/lib/ingest/normalize";
import { assignDenseRanks, sortByTotals, sortForPresentation } from "../algorithms/ranking";
import type { PlayerTotals } from "../types";
import { rank } from "../rank";

const none: PlayerRecords = new Map();

function sheet(rows: RawRow[]): SheetRows {
  return { name: "Tournoi", rows };
}

function totals(surname: string, givenName: string, totalPoints: number, totalScore: number): PlayerTotals {
  return { identity: { surname, givenName }, playCount: 1, slots: [totalPoints], totalScore, totalPoints };
}

function names(rows: { identity: { surname: string; givenName: string } }[]): string[] {
  return rows.map((r) => `${r.identity.surname} ${r.identity.givenName}`);
}

describe("sortByTotals", () => {
  it("orders by points, then score, then surname and given name", () => {
    const sorted = sortByTotals([
      totals("Martin", "Paul", 20, 80),
      totals("Dupont", "Zoé", 20, 80),
      totals("Martin", "Anne", 20, 80),
      totals("Bernard", "Luc", 20, 95),
      totals("Adam", "Eve", 5, 200),
      totals("Zola", "Max", 30, 10),
    ]);
    expect(names(sorted)).toEqual([
      "Zola Max",
      "Bernard Luc",
      "Dupont Zoé",
      "Martin Anne",
      "Martin Paul",
      "Adam Eve",
    ]);
  });
});

describe("assignDenseRanks", () => {
  it("shares a rank between equal totals and skips ahead after ties", () => {
    const ranked = assignDenseRanks([
      totals("A", "a", 30, 100),
      totals("B", "b", 20, 80),
      totals("C", "c", 20, 80),
      totals("D", "d", 10, 50),
    ]);
    expect(ranked.map((r) => r.rank)).toEqual([1, 2, 2, 4]);
  });

  it("separates equal points with different scores", () => {
    const ranked = assignDenseRanks([totals("A", "a", 20, 90), totals("B", "b", 20, 80)]);
    expect(ranked.map((r) => r.rank)).toEqual([1, 2]);
  });
});

describe("sortForPresentation", () => {
  it("orders tied ranks by name whatever the input order", () => {
    const rows: RankedRow[] = [
      { ...totals("Zed", "A", 10, 10), rank: 1 },
      { ...totals("Abel", "B", 10, 10), rank: 1 },
      { ...totals("Cole", "C", 30, 30), rank: 3 },
    ];
    expect(names(sortForPresentation(rows))).toEqual(["Abel B", "Zed A", "Cole C"]);
  });
});

describe("rank", () => {
  it("breaks equal points with the score", () => {
    const players = aggregate([sheet([["A", "Anne", 50, 10], ["B", "Bob", 60, 10]])]);
    const table = rank(players, 15);
    expect(names(table.rows)).toEqual(["B Bob", "A Anne"]);
    expect(table.rows.map((r) => r.rank)).toEqual([1, 2]);
    expect(table.headers).toHaveLength(21);
  });

  it("gives three tied players the same rank and the next one rank 4", () => {
    const players = aggregate([
      sheet([
        ["Charles", "c", 40, 10],
        ["Dumas", "d", 70, 5],
        ["Bertin", "b", 80, 20],
        ["Arnaud", "a", 50, 15],
      ]),
      sheet([
        ["Charles", "c", 40, 10],
        ["Arnaud", "a", 30, 5],
      ]),
    ]);
    const table = rank(players, 15);
    expect(names(table.rows)).toEqual(["Arnaud a", "Bertin b", "Charles c", "Dumas d"]);
    expect(table.rows.map((r) => r.rank)).toEqual([1, 1, 1, 4]);
    expect(table.rows.map((r) => [r.totalPoints, r.totalScore])).toEqual([
      [20, 80],
      [20, 80],
      [20, 80],
      [5, 70],
    ]);
  });

  it("emits one row per player with play counts capped at k", () => {
    const rows: RawRow[] = [
      ["Martin", "Léa", 10, 1],
      ["Martin", "Léa", 20, 2],
      ["Martin", "Léa", 30, 3],
      ["Dupont", "Jean", 15, 4],
      ["Durand", "Paul", "abc", 9],
    ];
    const table = rank(aggregate([sheet(rows)]), 2);
    expect(table.rows).toHaveLength(2);
    expect(table.rows.map((r) => [r.identity.surname, r.playCount, r.slots])).toEqual([
      ["Martin", 2, [3, 2]],
      ["Dupont", 1, [4, null]],
    ]);
  });

  it("keeps ranks non-decreasing in presentation order", () => {
    const rows: RawRow[] = [
      ["E", "e", 10, 3],
      ["D", "d", 10, 7],
      ["C", "c", 10, 7],
      ["B", "b", 99, 1],
      ["A", "a", 10, 3],
    ];
    const ranks = rank(aggregate([sheet(rows)]), 15).rows.map((r) => r.rank);
    expect(ranks).toEqual([1, 1, 3, 3, 5]);
  });

  it("is idempotent", () => {
    const players = aggregate([
      sheet([
        ["Martin", "Léa", 120, 18],
        ["Dupont", "Jean", 120, 18],
        ["Bernard", "Luc", 95.5, 12],
      ]),
    ]);
    expect(rank(players, 3)).toEqual(rank(players, 3));
  });

  it("returns headers and no rows for an empty mapping", () => {
    expect(rank(none, 3)).toEqual({
      topK: 3,
      headers: ["Classement", "Nom", "Prénom", "Participations", "1", "2", "3", "Scores", "Points"],
      rows: [],
    });
  });

  it("rejects a k that is not a positive integer", () => {
    for (const k of [0, -1, 1.5, Number.NaN]) {
      expect(() => rank(none, k)).toThrow(/Invalid top-k/);
    }
  });
});
