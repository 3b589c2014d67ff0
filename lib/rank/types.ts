import { z } from "zod";
import type { IngestReport, RankedRow, RankedTable } from "@/lib/domain/types";
import { SheetLayoutSchema } from "@/lib/ingest/schemas";

export const TopKSchema = z.number().int().positive();

// A player's row before the global ranking pass
export type PlayerTotals = Omit<RankedRow, "rank">;

export type ExportFormat = "csv" | "pdf";

export const RunOptionsSchema = z.object({
  excel: z.string().trim().min(1),
  outDir: z.string().trim().min(1),
  csv: z.boolean().default(false),
  pdf: z.boolean().default(false),
  day: z.string().trim().min(1),
  topK: TopKSchema,
  layout: SheetLayoutSchema.optional(),
  verbose: z.boolean().default(false),
});

export type RunOptionsInput = z.input<typeof RunOptionsSchema>;
export type RunOptions = z.infer<typeof RunOptionsSchema>;

export type ExportOutput = {
  format: ExportFormat;
  path: string;
};

export type RunResult = {
  outputs: ExportOutput[]; // csv before pdf
  report: IngestReport;
  table: RankedTable;
};
