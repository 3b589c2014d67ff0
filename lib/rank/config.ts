import type { SheetLayout } from "@/lib/ingest/schemas";

export const DEFAULT_TOP_K = 15;
export const DEFAULT_DAY = "Mardi";
export const DEFAULT_OUT_DIR = ".";

// Rows 4..100 inclusive; C/D names, I score, K points
export const DEFAULT_SHEET_LAYOUT: SheetLayout = {
  startRow: 4,
  endRow: 100,
  columns: { surname: "C", givenName: "D", score: "I", points: "K" },
};

export const DOCUMENT_TITLE = "Classement Tarot";

export function csvFileName(day: string): string {
  return `classement_tarot_${day}.csv`;
}

export function pdfFileName(day: string): string {
  return `classement_tarot_${day}.pdf`;
}

export type EnvDefaults = {
  topK: number; // NaN when the env value is not a number
  day: string;
  outDir: string;
};

export function envDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  return {
    topK: env.LEADERBOARD_TOP_K ? Number(env.LEADERBOARD_TOP_K) : DEFAULT_TOP_K,
    day: env.LEADERBOARD_DAY || DEFAULT_DAY,
    outDir: env.LEADERBOARD_OUT_DIR || DEFAULT_OUT_DIR,
  };
}
