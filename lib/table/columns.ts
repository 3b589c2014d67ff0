import type { RankedRow } from "@/lib/domain/types";

export type LeaderboardCell = string | number;

export interface LeaderboardColumn {
  id: string;
  header: string;
  group?: string; // label spanning consecutive columns in the printed header
  widthCm: number;
  align: "left" | "center";
  accessor: (row: RankedRow) => LeaderboardCell;
}

export const SLOTS_GROUP = "Points";
export const TOTALS_GROUP = "Totaux";

export const createLeaderboardColumns = (k: number): LeaderboardColumn[] => {
  const slotColumns = Array.from(
    { length: k },
    (_, i): LeaderboardColumn => ({
      id: `slot_${i + 1}`,
      header: String(i + 1),
      group: SLOTS_GROUP,
      widthCm: 1.2,
      align: "center",
      accessor: (row) => row.slots[i] ?? "",
    })
  );

  return [
    {
      id: "rank",
      header: "Classement",
      widthCm: 1.6,
      align: "center",
      accessor: (row) => row.rank,
    },
    {
      id: "surname",
      header: "Nom",
      widthCm: 2.6,
      align: "left",
      accessor: (row) => row.identity.surname,
    },
    {
      id: "givenName",
      header: "Prénom",
      widthCm: 2.6,
      align: "left",
      accessor: (row) => row.identity.givenName,
    },
    {
      id: "playCount",
      header: "Participations",
      widthCm: 1.8,
      align: "center",
      accessor: (row) => row.playCount,
    },
    ...slotColumns,
    {
      id: "totalScore",
      header: "Scores",
      group: TOTALS_GROUP,
      widthCm: 1.2,
      align: "center",
      accessor: (row) => row.totalScore,
    },
    {
      id: "totalPoints",
      header: "Points",
      group: TOTALS_GROUP,
      widthCm: 1.2,
      align: "center",
      accessor: (row) => row.totalPoints,
    },
  ];
};

export function buildHeaders(k: number): string[] {
  return createLeaderboardColumns(k).map((col) => col.header);
}

// One cell per header, blank slots as ""
export function flattenRow(row: RankedRow): LeaderboardCell[] {
  return createLeaderboardColumns(row.slots.length).map((col) => col.accessor(row));
}

/**
 * Display form of a cell: whole numbers without decimals, other numbers with
 * exactly one decimal, strings verbatim.
 */
export function formatCell(value: LeaderboardCell): string {
  if (typeof value === "number") {
    return Number.isInteger(value) ? String(value) : value.toFixed(1);
  }
  return value;
}

export function formatRow(row: RankedRow): string[] {
  return flattenRow(row).map(formatCell);
}
