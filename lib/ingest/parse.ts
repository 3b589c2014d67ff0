import { readFile } from "fs/promises";
import * as XLSX from "xlsx";
import type { RawCell, RawRow, SheetRows } from "@/lib/domain/types";
import { DEFAULT_SHEET_LAYOUT } from "@/lib/rank/config";
import { SheetLayoutSchema, formatIssues, type SheetLayout } from "./schemas";

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === "object" && value !== null && "t" in value;
}

function readCell(ws: XLSX.WorkSheet, address: string): RawCell {
  const cell: unknown = ws[address];
  if (!isCellObject(cell)) return null;
  // error cells carry a numeric code in v; stubs have no value
  if (cell.t === "e" || cell.t === "z") return null;
  return cell.v ?? null;
}

// Last used row (1-based), 0 for an empty sheet
function lastRow(ws: XLSX.WorkSheet): number {
  const ref = ws["!ref"];
  if (!ref) return 0;
  return XLSX.utils.decode_range(ref).e.r + 1;
}

function readWindow(ws: XLSX.WorkSheet, layout: SheetLayout): RawRow[] {
  const { surname, givenName, score, points } = layout.columns;
  const end = Math.min(layout.endRow, lastRow(ws));
  const rows: RawRow[] = [];
  for (let r = layout.startRow; r <= end; r++) {
    rows.push([
      readCell(ws, `${surname}${r}`),
      readCell(ws, `${givenName}${r}`),
      readCell(ws, `${score}${r}`),
      readCell(ws, `${points}${r}`),
    ]);
  }
  return rows;
}

export function resolveLayout(layout: SheetLayout = DEFAULT_SHEET_LAYOUT): SheetLayout {
  const parsed = SheetLayoutSchema.safeParse(layout);
  if (!parsed.success) {
    throw new Error(`Invalid sheet layout: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// One entry per worksheet, in workbook order
export function extractSheets(workbook: XLSX.WorkBook, layout?: SheetLayout): SheetRows[] {
  const resolved = resolveLayout(layout);
  return workbook.SheetNames.map((name) => {
    const ws = workbook.Sheets[name];
    return { name, rows: ws ? readWindow(ws, resolved) : [] };
  });
}

// .xlsx files are ZIP containers; anything else would be read as a CSV sheet
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

function isZip(data: Uint8Array): boolean {
  return ZIP_SIGNATURE.every((byte, i) => data[i] === byte);
}

export function parseWorkbook(data: Uint8Array, layout?: SheetLayout): SheetRows[] {
  if (!isZip(data)) {
    throw new Error(data.length === 0 ? "file is empty" : "not an .xlsx workbook");
  }
  const workbook = XLSX.read(data, {
    type: Buffer.isBuffer(data) ? "buffer" : "array",
    cellDates: true,
  });
  return extractSheets(workbook, layout);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function readWorkbookFile(path: string, layout?: SheetLayout): Promise<SheetRows[]> {
  const resolved = resolveLayout(layout);
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (err) {
    throw new Error(`Cannot read workbook ${path}: ${errorMessage(err)}`);
  }
  try {
    return parseWorkbook(data, resolved);
  } catch (err) {
    throw new Error(`Cannot parse workbook ${path}: ${errorMessage(err)}`);
  }
}
