import { mkdir, writeFile } from "fs/promises";
import path from "path";
import Papa from "papaparse";
import type { RankedTable } from "@/lib/domain/types";
import { formatRow } from "@/lib/table/columns";

// Spreadsheet apps need the BOM to pick UTF-8 for accented headers
const BOM = "\uFEFF";

/**
 * Serializes the ranked table to CSV text: header line, then one line per row,
 * CRLF separated, every row padded to the header width.
 */
export function toCsv(table: RankedTable): string {
  const data = table.rows.map((row) => {
    const cells = formatRow(row);
    while (cells.length < table.headers.length) cells.push("");
    return cells;
  });
  return BOM + Papa.unparse([table.headers, ...data], { newline: "\r\n" });
}

export async function exportCsv(
  table: RankedTable,
  outDir: string,
  filename: string
): Promise<string> {
  if (table.rows.length === 0) {
    console.warn("[export] no players ranked; CSV will only hold headers");
  }
  await mkdir(outDir, { recursive: true });
  const outPath = path.join(outDir, filename);
  await writeFile(outPath, toCsv(table), "utf8");
  return outPath;
}
