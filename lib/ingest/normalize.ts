import type {
  Contribution,
  IngestReport,
  PlayerIdentity,
  PlayerRecord,
  PlayerRecords,
  RawCell,
  RawRow,
  SheetRows,
} from "@/lib/domain/types";
import { NameCellSchema, NumericCellSchema } from "./schemas";
import { identityKey, makeIdentity } from "./identity";

export type NormalizedRow =
  | { kind: "blank" }
  | { kind: "emptyIdentity" }
  | { kind: "invalidScore"; identity: PlayerIdentity }
  | {
      kind: "contribution";
      identity: PlayerIdentity;
      contribution: Contribution;
      defaultedPoints: boolean;
    };

function isEmptyCell(cell: RawCell): boolean {
  return cell === null || (typeof cell === "string" && cell.trim() === "");
}

function nameOf(cell: RawCell): string {
  const parsed = NameCellSchema.safeParse(cell);
  return parsed.success ? parsed.data : "";
}

export function normalizeRow(row: RawRow): NormalizedRow {
  const [surnameCell, givenNameCell, scoreCell, pointsCell] = row;
  if (row.every(isEmptyCell)) return { kind: "blank" };

  const identity = makeIdentity(nameOf(surnameCell), nameOf(givenNameCell));
  if (!identity.surname && !identity.givenName) return { kind: "emptyIdentity" };

  const score = NumericCellSchema.safeParse(scoreCell);
  if (!score.success) return { kind: "invalidScore", identity };

  // Missing or unreadable points count as 0
  const points = NumericCellSchema.safeParse(pointsCell);
  return {
    kind: "contribution",
    identity,
    contribution: { score: score.data, points: points.success ? points.data : 0 },
    defaultedPoints: !points.success,
  };
}

function initReport(): IngestReport {
  return {
    sheets: 0,
    rowsScanned: 0,
    blankRows: 0,
    dropped: { emptyIdentity: 0, invalidScore: 0 },
    defaultedPoints: 0,
    contributions: 0,
    players: 0,
  };
}

export function aggregateWithReport(sheets: readonly SheetRows[]): {
  players: PlayerRecords;
  report: IngestReport;
} {
  const players = new Map<string, { identity: PlayerIdentity; contributions: Contribution[] }>();
  const report = initReport();

  for (const sheet of sheets) {
    report.sheets += 1;
    for (const row of sheet.rows) {
      report.rowsScanned += 1;
      const norm = normalizeRow(row);
      switch (norm.kind) {
        case "blank":
          report.blankRows += 1;
          break;
        case "emptyIdentity":
          report.dropped.emptyIdentity += 1;
          break;
        case "invalidScore":
          report.dropped.invalidScore += 1;
          break;
        case "contribution": {
          const key = identityKey(norm.identity);
          let entry = players.get(key);
          if (!entry) {
            entry = { identity: norm.identity, contributions: [] };
            players.set(key, entry);
          }
          entry.contributions.push(norm.contribution);
          report.contributions += 1;
          if (norm.defaultedPoints) report.defaultedPoints += 1;
          break;
        }
      }
    }
  }

  // Entries are only created on a contribution, so none is empty here
  const frozen = new Map<string, PlayerRecord>();
  for (const [key, entry] of players) {
    frozen.set(key, Object.freeze({ identity: entry.identity, contributions: Object.freeze(entry.contributions) }));
  }
  report.players = frozen.size;
  return { players: frozen, report };
}

export function aggregate(sheets: readonly SheetRows[]): PlayerRecords {
  return aggregateWithReport(sheets).players;
}
