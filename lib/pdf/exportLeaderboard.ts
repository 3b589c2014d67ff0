import { mkdir, writeFile } from "fs/promises";
import path from "path";
import PDFDocument from "pdfkit";
import type { RankedTable } from "@/lib/domain/types";
import { DOCUMENT_TITLE } from "@/lib/rank/config";
import { createLeaderboardColumns, formatRow } from "@/lib/table/columns";

export const CM = 72 / 2.54;

const TITLE_FONT_SIZE = 18;
const BODY_FONT_SIZE = 7;
const CELL_PADDING = 2;

const COLORS = {
  header: "#D3D3D3",
  grid: "#808080",
  text: "#000000",
  stripes: ["#F5F5F5", "#E0FFFF"],
} as const;

export type PdfPageOptions = {
  pageWidth: number;
  pageHeight: number;
  margin: number;
  rowHeight: number;
  titleHeight: number; // title line + spacer, first page only
};

// A4 landscape, points
export const DEFAULT_PDF_PAGE: PdfPageOptions = {
  pageWidth: 841.89,
  pageHeight: 595.28,
  margin: 0.7 * CM,
  rowHeight: 12,
  titleHeight: TITLE_FONT_SIZE * 1.2 + 0.3 * CM,
};

export type PdfColumn = {
  x: number;
  width: number;
  align: "left" | "center";
};

export type PdfHeaderCell = {
  text: string;
  x: number;
  width: number;
  row: 0 | 1;
  rowSpan: 1 | 2;
};

export type PdfTableLayout = {
  columns: PdfColumn[];
  header: PdfHeaderCell[];
  pages: string[][][]; // formatted body rows, per page
};

/**
 * Geometry of the printed table. Grouped columns (the top-k slots, the two
 * totals) share one label on the first header row and carry their own label on
 * the second; other columns span both header rows. Widths shrink together
 * when their natural sum exceeds the printable width.
 */
export function layoutLeaderboardPdf(
  table: RankedTable,
  page: PdfPageOptions = DEFAULT_PDF_PAGE
): PdfTableLayout {
  const defs = createLeaderboardColumns(table.topK);
  const available = page.pageWidth - 2 * page.margin;
  const natural = defs.reduce((sum, d) => sum + d.widthCm * CM, 0);
  const scale = Math.min(1, available / natural);

  const columns: PdfColumn[] = [];
  let x = page.margin;
  for (const d of defs) {
    const width = d.widthCm * CM * scale;
    columns.push({ x, width, align: d.align });
    x += width;
  }

  const header: PdfHeaderCell[] = [];
  let group: PdfHeaderCell | undefined;
  defs.forEach((d, i) => {
    const col = columns[i];
    if (!d.group) {
      header.push({ text: d.header, x: col.x, width: col.width, row: 0, rowSpan: 2 });
      group = undefined;
      return;
    }
    header.push({ text: d.header, x: col.x, width: col.width, row: 1, rowSpan: 1 });
    if (group && group.text === d.group) {
      group.width = col.x + col.width - group.x;
    } else {
      group = { text: d.group, x: col.x, width: col.width, row: 0, rowSpan: 1 };
      header.push(group);
    }
  });

  const body = page.pageHeight - 2 * page.margin - 2 * page.rowHeight;
  const firstCapacity = Math.max(1, Math.floor((body - page.titleHeight) / page.rowHeight));
  const nextCapacity = Math.max(1, Math.floor(body / page.rowHeight));

  const rows = table.rows.map(formatRow);
  const pages: string[][][] = [rows.slice(0, firstCapacity)];
  for (let i = firstCapacity; i < rows.length; i += nextCapacity) {
    pages.push(rows.slice(i, i + nextCapacity));
  }
  return { columns, header, pages };
}

function drawCell(
  doc: PDFKit.PDFDocument,
  text: string,
  box: { x: number; y: number; width: number; height: number },
  opts: { fill: string; align: "left" | "center"; bold: boolean }
): void {
  doc.lineWidth(0.25).rect(box.x, box.y, box.width, box.height).fillAndStroke(opts.fill, COLORS.grid);
  if (!text) return;
  doc
    .fillColor(COLORS.text)
    .font(opts.bold ? "Helvetica-Bold" : "Helvetica")
    .fontSize(BODY_FONT_SIZE)
    .text(text, box.x + CELL_PADDING, box.y + (box.height - BODY_FONT_SIZE) / 2, {
      width: box.width - 2 * CELL_PADDING,
      height: box.height,
      align: opts.align,
      ellipsis: true,
    });
}

function drawPage(
  doc: PDFKit.PDFDocument,
  layout: PdfTableLayout,
  rows: string[][],
  top: number,
  page: PdfPageOptions
): void {
  const h = page.rowHeight;
  for (const cell of layout.header) {
    drawCell(
      doc,
      cell.text,
      { x: cell.x, y: top + cell.row * h, width: cell.width, height: h * cell.rowSpan },
      { fill: COLORS.header, align: "center", bold: true }
    );
  }
  rows.forEach((cells, r) => {
    const y = top + (r + 2) * h;
    const fill = COLORS.stripes[r % COLORS.stripes.length];
    cells.forEach((text, c) => {
      const col = layout.columns[c];
      if (!col) return;
      drawCell(doc, text, { x: col.x, y, width: col.width, height: h }, { fill, align: col.align, bold: false });
    });
  });
}

export function renderLeaderboardPdf(
  table: RankedTable,
  day: string,
  page: PdfPageOptions = DEFAULT_PDF_PAGE
): Promise<Buffer> {
  const layout = layoutLeaderboardPdf(table, page);
  const doc = new PDFDocument({
    size: [page.pageWidth, page.pageHeight],
    margins: { top: page.margin, bottom: page.margin, left: page.margin, right: page.margin },
    info: { Title: DOCUMENT_TITLE, Author: DOCUMENT_TITLE },
  });

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc
      .fillColor(COLORS.text)
      .font("Helvetica-Bold")
      .fontSize(TITLE_FONT_SIZE)
      .text(`Challenge du ${day}`, page.margin, page.margin, {
        width: page.pageWidth - 2 * page.margin,
        align: "center",
      });

    layout.pages.forEach((rows, i) => {
      if (i > 0) doc.addPage();
      const top = i === 0 ? page.margin + page.titleHeight : page.margin;
      drawPage(doc, layout, rows, top, page);
    });
    doc.end();
  });
}

export async function exportPdf(
  table: RankedTable,
  outDir: string,
  filename: string,
  day: string
): Promise<string> {
  const bytes = await renderLeaderboardPdf(table, day);
  await mkdir(outDir, { recursive: true });
  const outPath = path.join(outDir, filename);
  await writeFile(outPath, bytes);
  return outPath;
}
