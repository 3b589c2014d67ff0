import { z } from "zod";

// Helpers
function numericText(s: string): number {
  const t = s.trim();
  return t === "" ? Number.NaN : Number(t);
}

// Score/points cells: numbers as-is, numeric text trimmed; blanks, booleans and dates fail
export const NumericCellSchema = z
  .union([z.number(), z.string().transform(numericText)])
  .pipe(z.number().finite());

// Name cells: stringified and trimmed; empty cell → ""
export const NameCellSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .nullable()
  .transform((v) => (v === null ? "" : String(v).trim()));

const columnLetter = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{1,3}$/, "expected a column letter such as C or AB");

// Row window is 1-based and inclusive, as displayed by spreadsheet apps
export const SheetLayoutSchema = z.object({
  startRow: z.number().int().min(1),
  endRow: z.number().int().min(1),
  columns: z.object({
    surname: columnLetter,
    givenName: columnLetter,
    score: columnLetter,
    points: columnLetter,
  }),
});

export type SheetLayout = z.infer<typeof SheetLayoutSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
