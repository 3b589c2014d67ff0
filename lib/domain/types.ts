// Domain models for the season leaderboard

export type PlayerIdentity = {
  readonly surname: string;
  readonly givenName: string;
};

export type Contribution = {
  readonly score: number;
  readonly points: number;
};

export type PlayerRecord = {
  readonly identity: PlayerIdentity;
  readonly contributions: readonly Contribution[];
};

// Keyed by identityKey(); iteration order = first encounter
export type PlayerRecords = ReadonlyMap<string, PlayerRecord>;

// Cell value as read from a workbook; null = empty cell (distinct from 0)
export type RawCell = string | number | boolean | Date | null;

// [surname, givenName, score, points]
export type RawRow = readonly [RawCell, RawCell, RawCell, RawCell];

export type SheetRows = {
  name: string;
  rows: readonly RawRow[];
};

export type RankedRow = {
  rank: number;
  identity: PlayerIdentity;
  playCount: number;
  slots: (number | null)[]; // length === k, null = blank
  totalScore: number;
  totalPoints: number;
};

export type RankedTable = {
  topK: number;
  headers: string[];
  rows: RankedRow[];
};

export type IngestReport = {
  sheets: number;
  rowsScanned: number;
  blankRows: number;
  dropped: {
    emptyIdentity: number;
    invalidScore: number;
  };
  defaultedPoints: number;
  contributions: number;
  players: number;
};
